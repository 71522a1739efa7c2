import http from 'http';
import { logDataAccessRecord, logSecurityEvent } from '../logging/Logger';
import { preventLogInjection } from '../logging/LogSanitizer';
import {
  DataAccessRecord,
  SecurityEvent,
  SecurityEventCategory,
  SecurityEventSeverity,
} from '../logging/SecurityEvents';
import { PrincipalResolver, anonymousPrincipal } from '../auth/PrincipalResolver';
import {
  ClientIpResolver,
  getClientIp,
  getUserAgent,
  splitRequestTarget,
} from '../http/RequestInfo';
import {
  BodyActivityArgs,
  RequestActivityArgs,
  SecurityEventSink,
  SuspiciousActivityArgs,
  isBodyActivityArgs,
} from './SecurityEventSink';

const MAX_MATCHED_VALUE_LENGTH = 100;
const UNKNOWN = 'Unknown';

export interface StructuredSinkOptions {
  principal?: PrincipalResolver;
  clientIp?: ClientIpResolver;
  publish?: (event: SecurityEvent) => void;
  publishDataAccess?: (record: DataAccessRecord) => void;
  now?: () => Date;
}

function clean(value: string | undefined | null, maxLength?: number): string {
  return value ? preventLogInjection(value, maxLength) : UNKNOWN;
}

function cleanOptional(value: string | undefined | null, maxLength?: number): string | undefined {
  return value ? preventLogInjection(value, maxLength) : undefined;
}

/**
 * Default sink: turns each call into a SecurityEvent or DataAccessRecord with
 * every request-derived string neutralised, then hands it to a publisher
 * (the structured logger unless one is supplied).
 */
export class StructuredSecurityEventSink implements SecurityEventSink {
  private readonly principal: PrincipalResolver;
  private readonly clientIp: ClientIpResolver;
  private readonly publish: (event: SecurityEvent) => void;
  private readonly publishDataAccess: (record: DataAccessRecord) => void;
  private readonly now: () => Date;

  constructor(options: StructuredSinkOptions = {}) {
    this.principal = options.principal ?? anonymousPrincipal;
    this.clientIp = options.clientIp ?? getClientIp;
    this.publish = options.publish ?? logSecurityEvent;
    this.publishDataAccess = options.publishDataAccess ?? logDataAccessRecord;
    this.now = options.now ?? (() => new Date());
  }

  public onSuspiciousActivity(
    req: http.IncomingMessage,
    category: SecurityEventCategory,
    detail: string,
    matchedValue: string | null,
    severity: SecurityEventSeverity
  ): void;
  public onSuspiciousActivity(
    category: SecurityEventCategory,
    detail: string,
    field: string | null,
    severity: SecurityEventSeverity,
    path: string,
    method: string,
    ip: string,
    userAgent: string,
    userId?: string
  ): void;
  public onSuspiciousActivity(...args: SuspiciousActivityArgs): void {
    this.publish(isBodyActivityArgs(args) ? this.fromBodyScan(args) : this.fromRequest(args));
  }

  public logDataAccess(
    userId: string,
    areaTag: string,
    path: string,
    method: string,
    statusCode?: number
  ): void {
    this.publishDataAccess({
      userId: clean(userId),
      area: clean(areaTag),
      path: clean(path),
      method: clean(method),
      statusCode,
      timestamp: this.now().toISOString(),
    });
  }

  private fromRequest([req, category, detail, matchedValue, severity]: RequestActivityArgs): SecurityEvent {
    const { path } = splitRequestTarget(req.url);
    return {
      category,
      severity,
      detail: clean(detail),
      requestPath: clean(path),
      httpMethod: clean(req.method),
      clientIp: clean(this.clientIp(req)),
      userAgent: clean(getUserAgent(req)),
      userId: cleanOptional(this.principal(req)),
      matchedValue: cleanOptional(matchedValue, MAX_MATCHED_VALUE_LENGTH),
      timestamp: this.now().toISOString(),
    };
  }

  private fromBodyScan([
    category,
    detail,
    field,
    severity,
    path,
    method,
    ip,
    userAgent,
    userId,
  ]: BodyActivityArgs): SecurityEvent {
    return {
      category,
      severity,
      detail: clean(detail),
      requestPath: clean(path),
      httpMethod: clean(method),
      clientIp: clean(ip),
      userAgent: clean(userAgent),
      userId: cleanOptional(userId),
      field: cleanOptional(field, MAX_MATCHED_VALUE_LENGTH),
      timestamp: this.now().toISOString(),
    };
  }
}
