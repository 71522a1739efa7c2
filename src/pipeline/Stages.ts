import http from 'http';
import logger from '../logging/Logger';
import { PatternRegistry } from '../patterns/PatternRegistry';
import { UserAgentClassifier, isReportable } from '../classification/UserAgentClassifier';
import { FormBodyScanner } from '../middleware/FormBodyScanner';
import { safeDecode } from '../http/RequestInfo';
import { SecurityEventCategory, SecurityEventSeverity } from '../logging/SecurityEvents';

export type InspectionPhase =
  | 'Start'
  | 'PreChecked'
  | 'Invoking'
  | 'ExceptionClassified'
  | 'PostChecked'
  | 'Completed';

/**
 * Per-request view shared by every stage. Created fresh for each request and
 * never shared across requests.
 */
export interface InspectionContext {
  readonly req: http.IncomingMessage;
  readonly res: http.ServerResponse;
  readonly method: string;
  readonly path: string;
  readonly query: string;
  readonly clientIp: string;
  readonly userAgent: string | undefined;
  readonly phase: InspectionPhase;
  /** Authenticated principal, resolved at the time of the call */
  userId(): string | undefined;
  report(
    category: SecurityEventCategory,
    detail: string,
    matchedValue: string | null,
    severity: SecurityEventSeverity
  ): void;
  reportBodyFinding(
    category: SecurityEventCategory,
    detail: string,
    field: string,
    severity: SecurityEventSeverity
  ): void;
  recordDataAccess(userId: string, areaTag: string, statusCode?: number): void;
}

export interface InvocationOutcome {
  elapsedMs: number;
  /** Present when the downstream handler threw */
  error?: unknown;
  /** The client went away before the response finished */
  cancelled: boolean;
}

export interface PreInvocationStage {
  readonly name: string;
  run(ctx: InspectionContext): void | Promise<void>;
}

export interface PostInvocationStage {
  readonly name: string;
  run(ctx: InspectionContext, outcome: InvocationOutcome): void;
}

export function urlThreatStage(registry: PatternRegistry): PreInvocationStage {
  return {
    name: 'url-threat',
    run(ctx) {
      const match = registry.matchUrlThreat(ctx.path, ctx.query);
      if (match.matched) {
        ctx.report(
          match.category,
          `Suspicious pattern '${match.pattern}' detected in request`,
          match.pattern,
          match.severity
        );
      }
    },
  };
}

export function userAgentStage(classifier: UserAgentClassifier): PreInvocationStage {
  return {
    name: 'user-agent',
    run(ctx) {
      const classification = classifier.classify(ctx.userAgent, ctx.path);
      if (!isReportable(classification)) {
        return;
      }

      switch (classification.verdict) {
        case 'missing':
          ctx.report(
            classification.category,
            'Request has no User-Agent header',
            null,
            classification.severity
          );
          break;
        case 'scanner':
          ctx.report(
            classification.category,
            `Security scanning tool detected in user agent: ${ctx.userAgent}`,
            classification.token,
            classification.severity
          );
          break;
        case 'automation':
          ctx.report(
            classification.category,
            `Automated client detected in user agent: ${ctx.userAgent}`,
            classification.token,
            classification.severity
          );
          break;
      }
    },
  };
}

export function formBodyStage(scanner: FormBodyScanner): PreInvocationStage {
  return {
    name: 'form-body',
    async run(ctx) {
      if (!FormBodyScanner.isApplicable(ctx.req)) {
        return;
      }

      const result = await scanner.scan(ctx.req);
      for (const finding of result.findings) {
        const grammar =
          finding.category === SecurityEventCategory.XSSPatternDetection ? 'XSS' : 'SQL injection';
        ctx.reportBodyFinding(
          finding.category,
          `${grammar} pattern detected in field ${finding.field}`,
          finding.field,
          finding.severity
        );
      }
    },
  };
}

export function slowRequestStage(thresholdMs: number): PostInvocationStage {
  return {
    name: 'slow-request',
    run(ctx, outcome) {
      if (outcome.elapsedMs > thresholdMs) {
        const seconds = (outcome.elapsedMs / 1000).toFixed(2);
        ctx.report(
          SecurityEventCategory.SlowRequest,
          `Request to ${ctx.path} took ${seconds} seconds`,
          null,
          SecurityEventSeverity.Medium
        );
      }
    },
  };
}

export function sensitiveAreaStage(prefixes: readonly string[]): PostInvocationStage {
  const lowered = prefixes.map((prefix) => prefix.toLowerCase());
  return {
    name: 'sensitive-area',
    run(ctx) {
      const path = safeDecode(ctx.path).toLowerCase();
      if (!lowered.some((prefix) => path.startsWith(prefix))) {
        return;
      }
      const userId = ctx.userId();
      if (!userId) {
        return;
      }
      ctx.recordDataAccess(
        userId,
        SecurityEventCategory.SensitiveAreaAccess,
        ctx.res.headersSent ? ctx.res.statusCode : undefined
      );
    },
  };
}

export function loginAccessStage(): PostInvocationStage {
  return {
    name: 'login-access',
    run(ctx, outcome) {
      if (
        outcome.error === undefined &&
        ctx.path.toLowerCase().includes('/login') &&
        ctx.res.statusCode === 200
      ) {
        logger.info({ path: ctx.path, ip: ctx.clientIp }, 'Login page accessed successfully');
      }
    },
  };
}
