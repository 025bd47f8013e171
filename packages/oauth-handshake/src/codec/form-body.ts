/**
 * Parses an OAuth1 `key=value&...` response body.
 *
 * Parsing is lenient because providers do not formally specify the format:
 * - a segment without `=` maps its key to `''`
 * - a key with an empty value maps to `''`
 * - a repeated key keeps its last value
 * - values are taken verbatim (no percent-decoding); everything after the first `=` is the value
 * - empty segments are skipped
 *
 * @example
 * ```typescript
 * const map = parseFormBody('oauth_token=abc&oauth_callback_confirmed&x=1&x=2');
 * map.get('oauth_token');              // 'abc'
 * map.get('oauth_callback_confirmed'); // ''
 * map.get('x');                        // '2'
 * ```
 */
export const parseFormBody = (body: string): ReadonlyMap<string, string> => {
  const result = new Map<string, string>();

  for (const segment of body.split('&')) {
    if (segment.length === 0) {
      continue;
    }
    const separator = segment.indexOf('=');
    if (separator === -1) {
      result.set(segment, '');
    } else {
      result.set(segment.slice(0, separator), segment.slice(separator + 1));
    }
  }

  return result;
};
