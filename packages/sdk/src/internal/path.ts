/**
 * Tagged template that URI-encodes every interpolated path segment:
 * path`/vnets/${id}/transactions/${hash}`.
 */
export function path(strings: TemplateStringsArray, ...segments: Array<string | number>): string {
  return strings.reduce((acc, literal, i) => {
    const segment = segments[i - 1];
    return acc + (segment === undefined ? '' : encodeURIComponent(String(segment))) + literal;
  });
}

export type QueryValue = string | number | boolean | undefined;

/** Build "?a=1&b=2", dropping undefined values. Empty string when nothing is set. */
export function queryString(params: Record<string, QueryValue>): string {
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) query.set(key, String(value));
  }
  const qs = query.toString();
  return qs ? `?${qs}` : '';
}
