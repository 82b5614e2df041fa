// @packroom/auth — Where a request carries its access token

/** The parts of an inbound request a token source may read. */
export interface TokenRequest {
  query(name: string): string | undefined;
  header(name: string): string | undefined;
}

export type TokenSource = (req: TokenRequest) => string | undefined;

/** `?token=<jwt>` (kept for links and older clients). */
export function queryParamSource(name = 'token'): TokenSource {
  return (req) => req.query(name) || undefined;
}

/** `Authorization: Bearer <jwt>` — exactly two space-separated parts. */
export function bearerHeaderSource(): TokenSource {
  return (req) => {
    const header = req.header('Authorization');
    if (!header) return undefined;
    const parts = header.split(' ');
    if (parts.length !== 2 || parts[0] !== 'Bearer') return undefined;
    return parts[1] || undefined;
  };
}

/** Query parameter wins over the header. */
export const DEFAULT_TOKEN_SOURCES: readonly TokenSource[] = [
  queryParamSource(),
  bearerHeaderSource(),
];

/**
 * Try each source in order; the first non-empty value wins.
 */
export function extractToken(
  req: TokenRequest,
  sources: readonly TokenSource[] = DEFAULT_TOKEN_SOURCES,
): string | undefined {
  for (const source of sources) {
    const token = source(req);
    if (token) return token;
  }
  return undefined;
}
