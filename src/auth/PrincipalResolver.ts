import http from 'http';

/**
 * Resolves the authenticated identity behind a request, if any
 */
export type PrincipalResolver = (req: http.IncomingMessage) => string | undefined;

export const anonymousPrincipal: PrincipalResolver = () => undefined;

/**
 * Trust an identity header set by an authenticating proxy or an earlier
 * middleware. Only safe when that component overwrites the header.
 */
export function headerPrincipal(headerName: string = 'x-user-id'): PrincipalResolver {
  const name = headerName.toLowerCase();
  return (req) => {
    const value = req.headers[name];
    const userId = Array.isArray(value) ? value[0] : value;
    return userId && userId.trim().length > 0 ? userId.trim() : undefined;
  };
}
