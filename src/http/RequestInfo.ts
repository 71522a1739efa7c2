import http from 'http';

export const UNKNOWN_CLIENT_IP = 'unknown';

export type ClientIpResolver = (req: http.IncomingMessage) => string;

function firstHeaderValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Resolve the originating client address, preferring proxy headers over the
 * socket so deployments behind a reverse proxy report the real client.
 */
export function getClientIp(req: http.IncomingMessage): string {
  const forwarded = firstHeaderValue(req.headers['x-forwarded-for']);
  if (forwarded) {
    const first = forwarded
      .split(',')
      .map((entry) => entry.trim())
      .find((entry) => entry.length > 0);
    if (first) {
      return first;
    }
  }

  const realIp = firstHeaderValue(req.headers['x-real-ip'])?.trim();
  if (realIp) {
    return realIp;
  }

  return req.socket?.remoteAddress || UNKNOWN_CLIENT_IP;
}

/**
 * The User-Agent header, or undefined when absent or blank
 */
export function getUserAgent(req: http.IncomingMessage): string | undefined {
  const userAgent = firstHeaderValue(req.headers['user-agent']);
  return userAgent && userAgent.trim().length > 0 ? userAgent : undefined;
}

export interface RequestTarget {
  path: string;
  query: string;
}

/**
 * Split the raw request target into path and query without normalising it.
 * `new URL()` would resolve dot segments and hide traversal attempts.
 */
export function splitRequestTarget(url: string | undefined): RequestTarget {
  const target = url || '/';
  const queryStart = target.indexOf('?');
  if (queryStart === -1) {
    return { path: target, query: '' };
  }
  return {
    path: target.substring(0, queryStart),
    query: target.substring(queryStart + 1),
  };
}

const PERCENT_ESCAPE_RUN = /(?:%[0-9a-fA-F]{2})+/g;

function decodeEscapeRun(run: string): string {
  try {
    return decodeURIComponent(run);
  } catch (error) {
    if (error instanceof URIError) {
      return run;
    }
    throw error;
  }
}

/**
 * Percent-decode without throwing. Each run of escapes is decoded on its own,
 * so a stray '%' or an invalid UTF-8 sequence stays as written while every
 * other escape in the value is still decoded.
 */
export function safeDecode(value: string): string {
  if (!value.includes('%')) {
    return value;
  }
  return value.replace(PERCENT_ESCAPE_RUN, decodeEscapeRun);
}

export function decodeQuery(query: string): string {
  return safeDecode(query.replace(/\+/g, ' '));
}
