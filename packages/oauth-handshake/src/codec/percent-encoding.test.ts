import { describe, it, expect } from 'vitest';
import { percentEncode, normalizeParameters, encodeFormBody } from './percent-encoding.js';
import type { Parameter } from './percent-encoding.js';

const UNRESERVED = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-._~';

describe('percentEncode', () => {
  it('percentEncode_UnreservedCharacters_ReturnsInputUnchanged', () => {
    // Act
    const encoded = percentEncode(UNRESERVED);

    // Assert
    expect(encoded).toBe(UNRESERVED);
  });

  it('percentEncode_AlreadyEncodedOutput_IsStableForUnreservedResult', () => {
    // Arrange
    const once = percentEncode('token_abc-123.x~y');

    // Act
    const twice = percentEncode(once);

    // Assert
    expect(twice).toBe(once);
  });

  it('percentEncode_Space_EncodesAsPercent20NotPlus', () => {
    expect(percentEncode('a b')).toBe('a%20b');
  });

  it('percentEncode_Plus_IsEncoded', () => {
    expect(percentEncode('Ladies + Gentlemen')).toBe('Ladies%20%2B%20Gentlemen');
  });

  it('percentEncode_SubDelimiters_AreEncoded', () => {
    expect(percentEncode("it's (fine)*!")).toBe('it%27s%20%28fine%29%2A%21');
  });

  it('percentEncode_ReservedCharacters_UseUppercaseHex', () => {
    expect(percentEncode('/:?#[]@&=,;$')).toBe('%2F%3A%3F%23%5B%5D%40%26%3D%2C%3B%24');
  });

  it('percentEncode_MultiByteCharacters_EncodesEachUtf8Byte', () => {
    expect(percentEncode('é')).toBe('%C3%A9');
    expect(percentEncode('☃')).toBe('%E2%98%83');
  });

  it('percentEncode_LoneSurrogate_EncodesReplacementCharacter', () => {
    expect(percentEncode('v\uDC00')).toBe('v%EF%BF%BD');
    expect(percentEncode('\uD800s')).toBe('%EF%BF%BDs');
  });

  it('percentEncode_SurrogatePair_EncodesFourByteSequence', () => {
    expect(percentEncode('\u{1F600}')).toBe('%F0%9F%98%80');
  });

  it('percentEncode_EmptyString_ReturnsEmptyString', () => {
    expect(percentEncode('')).toBe('');
  });
});

describe('normalizeParameters', () => {
  it('normalizeParameters_UnsortedInput_SortsByKeyThenValue', () => {
    // Arrange
    const params: Parameter[] = [
      ['b', '2'],
      ['a', 'x y'],
      ['a', '1'],
    ];

    // Act
    const normalized = normalizeParameters(params);

    // Assert
    expect(normalized).toBe('a=1&a=x%20y&b=2');
  });

  it('normalizeParameters_DifferentInputOrders_ProduceSameOutput', () => {
    // Arrange
    const forward: Parameter[] = [
      ['oauth_nonce', 'n1'],
      ['status', 'hello world'],
      ['oauth_consumer_key', 'ck'],
      ['include_entities', 'true'],
    ];
    const reversed = [...forward].reverse();

    // Act
    const first = normalizeParameters(forward);
    const second = normalizeParameters(reversed);

    // Assert
    expect(first).toBe(second);
    expect(first).toBe(
      'include_entities=true&oauth_consumer_key=ck&oauth_nonce=n1&status=hello%20world'
    );
  });

  it('normalizeParameters_RepeatedCalls_ReturnSameOutput', () => {
    // Arrange
    const params: Parameter[] = [
      ['z', '1'],
      ['y', '2'],
    ];

    // Act
    const results = [normalizeParameters(params), normalizeParameters(params)];

    // Assert
    expect(results[0]).toBe('y=2&z=1');
    expect(results[1]).toBe(results[0]);
  });

  it('normalizeParameters_ExactDuplicatePair_KeepsOneCopy', () => {
    expect(
      normalizeParameters([
        ['a', '1'],
        ['a', '1'],
        ['a', '2'],
      ])
    ).toBe('a=1&a=2');
  });

  it('normalizeParameters_SortsByEncodedKey_NotRawKey', () => {
    // '%' (0x25) sorts before '-' (0x2D) once the space is encoded
    expect(
      normalizeParameters([
        ['a-b', '2'],
        ['a b', '1'],
      ])
    ).toBe('a%20b=1&a-b=2');
  });

  it('normalizeParameters_UppercaseKeys_SortBeforeLowercase', () => {
    expect(
      normalizeParameters([
        ['b', '1'],
        ['B', '1'],
      ])
    ).toBe('B=1&b=1');
  });

  it('normalizeParameters_SeparatorsInsideValues_DoNotCollideWithSeparatePairs', () => {
    // Arrange
    const embedded = normalizeParameters([['a', '1&b=2']]);
    const separate = normalizeParameters([
      ['a', '1'],
      ['b', '2'],
    ]);

    // Assert
    expect(embedded).toBe('a=1%26b%3D2');
    expect(separate).toBe('a=1&b=2');
  });

  it('normalizeParameters_EmptySet_ReturnsEmptyString', () => {
    expect(normalizeParameters([])).toBe('');
  });
});

describe('encodeFormBody', () => {
  it('encodeFormBody_KeepsInputOrderAndEncodesValues', () => {
    // Act
    const body = encodeFormBody([
      ['grant_type', 'authorization_code'],
      ['redirect_uri', 'http://localhost:8000/callback'],
    ]);

    // Assert
    expect(body).toBe(
      'grant_type=authorization_code&redirect_uri=http%3A%2F%2Flocalhost%3A8000%2Fcallback'
    );
  });
});
