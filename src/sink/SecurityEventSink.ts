import http from 'http';
import { SecurityEventCategory, SecurityEventSeverity } from '../logging/SecurityEvents';

/**
 * Receiver of everything the inspector detects. Implementations own
 * persistence, deduplication and alerting, and must tolerate concurrent calls.
 * A returned promise is never awaited by the request that produced the event.
 */
export interface SecurityEventSink {
  /**
   * Threat signal raised while the request object is still at hand
   */
  onSuspiciousActivity(
    req: http.IncomingMessage,
    category: SecurityEventCategory,
    detail: string,
    matchedValue: string | null,
    severity: SecurityEventSeverity
  ): void | Promise<void>;

  /**
   * Threat signal raised by the body scanner, with the request context already
   * extracted because the body stream has been consumed
   */
  onSuspiciousActivity(
    category: SecurityEventCategory,
    detail: string,
    field: string | null,
    severity: SecurityEventSeverity,
    path: string,
    method: string,
    ip: string,
    userAgent: string,
    userId?: string
  ): void | Promise<void>;

  /**
   * Audit trail for authenticated access to a sensitive area
   */
  logDataAccess(
    userId: string,
    areaTag: string,
    path: string,
    method: string,
    statusCode?: number
  ): void | Promise<void>;
}

export type RequestActivityArgs = [
  req: http.IncomingMessage,
  category: SecurityEventCategory,
  detail: string,
  matchedValue: string | null,
  severity: SecurityEventSeverity,
];

export type BodyActivityArgs = [
  category: SecurityEventCategory,
  detail: string,
  field: string | null,
  severity: SecurityEventSeverity,
  path: string,
  method: string,
  ip: string,
  userAgent: string,
  userId?: string,
];

export type SuspiciousActivityArgs = RequestActivityArgs | BodyActivityArgs;

export function isBodyActivityArgs(args: SuspiciousActivityArgs): args is BodyActivityArgs {
  return typeof args[0] === 'string';
}
