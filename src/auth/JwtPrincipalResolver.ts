import http from 'http';
import jwt from 'jsonwebtoken';
import { readFileSync } from 'fs';
import logger from '../logging/Logger';
import { PrincipalResolver } from './PrincipalResolver';

export interface JwtPrincipalConfig {
  publicKeyPath: string;
  issuer?: string;
  audience?: string;
}

/**
 * Resolves the principal from an RS256 bearer token. Unlike an authenticating
 * middleware it never rejects: an invalid or missing token simply means the
 * request is anonymous.
 */
export class JwtPrincipalResolver {
  private readonly publicKey: string;
  private readonly resolved = new WeakMap<http.IncomingMessage, string | null>();

  constructor(private readonly config: JwtPrincipalConfig) {
    try {
      this.publicKey = readFileSync(config.publicKeyPath, 'utf8');
      logger.info({ keyPath: config.publicKeyPath }, 'JWT public key loaded');
    } catch (error) {
      logger.error({ error, keyPath: config.publicKeyPath }, 'Failed to load JWT public key');
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load JWT public key: ${reason}`);
    }
  }

  /**
   * Extract JWT from Authorization header
   */
  private extractToken(req: http.IncomingMessage): string | null {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      return null;
    }

    // Authorization header format: "Bearer <token>"
    const parts = authHeader.split(' ');
    if (parts.length !== 2 || parts[0] !== 'Bearer') {
      return null;
    }

    return parts[1];
  }

  private verify(token: string): string | null {
    try {
      const decoded = jwt.verify(token, this.publicKey, {
        algorithms: ['RS256'],
        issuer: this.config.issuer,
        audience: this.config.audience,
      });

      if (typeof decoded === 'string' || !decoded.sub) {
        return null;
      }
      return decoded.sub;
    } catch (error) {
      if (error instanceof jwt.JsonWebTokenError) {
        // TokenExpiredError and NotBeforeError extend JsonWebTokenError
        logger.debug({ reason: error.name }, 'Bearer token rejected, treating request as anonymous');
        return null;
      }
      throw error;
    }
  }

  /**
   * Verified subject of the request's bearer token; computed once per request
   */
  public resolve(req: http.IncomingMessage): string | undefined {
    let userId = this.resolved.get(req);
    if (userId === undefined) {
      const token = this.extractToken(req);
      userId = token ? this.verify(token) : null;
      this.resolved.set(req, userId);
    }
    return userId ?? undefined;
  }

  public toResolver(): PrincipalResolver {
    return (req) => this.resolve(req);
  }
}
