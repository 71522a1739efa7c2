import http from 'http';
import logger from '../logging/Logger';
import { PatternRegistry } from '../patterns/PatternRegistry';
import { UserAgentClassifier } from '../classification/UserAgentClassifier';
import { ExceptionClassifier } from '../classification/ExceptionClassifier';
import { FormBodyScanner } from './FormBodyScanner';
import { SecurityEventSink } from '../sink/SecurityEventSink';
import { DEFAULT_SINK_TIMEOUT_MS, SinkDispatcher } from '../sink/SinkDispatcher';
import { PrincipalResolver, anonymousPrincipal } from '../auth/PrincipalResolver';
import {
  ClientIpResolver,
  getClientIp,
  getUserAgent,
  splitRequestTarget,
} from '../http/RequestInfo';
import { DEFAULT_SENSITIVE_PATH_PREFIXES } from '../config/Config';
import { SecurityEventCategory, SecurityEventSeverity } from '../logging/SecurityEvents';
import {
  InspectionContext,
  InspectionPhase,
  InvocationOutcome,
  PostInvocationStage,
  PreInvocationStage,
  formBodyStage,
  loginAccessStage,
  sensitiveAreaStage,
  slowRequestStage,
  urlThreatStage,
  userAgentStage,
} from '../pipeline/Stages';
import { Middleware, NextFunction } from '../pipeline/MiddlewareChain';
import { rewindRequest } from '../http/BodyReplay';

export const DEFAULT_SLOW_REQUEST_THRESHOLD_MS = 10000;

export interface RequestInspectorConfig {
  registry: PatternRegistry;
  sink: SecurityEventSink;
  principal?: PrincipalResolver;
  clientIp?: ClientIpResolver;
  userAgentClassifier?: UserAgentClassifier;
  exceptionClassifier?: ExceptionClassifier;
  /** Pass null to disable body scanning */
  formBodyScanner?: FormBodyScanner | null;
  slowRequestThresholdMs?: number;
  sensitivePathPrefixes?: readonly string[];
  sinkTimeoutMs?: number;
  /** Millisecond clock used to time the downstream call */
  clock?: () => number;
}

class RequestInspection implements InspectionContext {
  public readonly method: string;
  public readonly path: string;
  public readonly query: string;
  public readonly clientIp: string;
  public readonly userAgent: string | undefined;
  public phase: InspectionPhase = 'Start';

  constructor(
    public readonly req: http.IncomingMessage,
    public readonly res: http.ServerResponse,
    private readonly sink: SecurityEventSink,
    private readonly dispatcher: SinkDispatcher,
    private readonly principal: PrincipalResolver,
    clientIp: ClientIpResolver
  ) {
    const target = splitRequestTarget(req.url);
    this.method = (req.method || 'GET').toUpperCase();
    this.path = target.path;
    this.query = target.query;
    this.clientIp = clientIp(req);
    this.userAgent = getUserAgent(req);
  }

  public enter(phase: InspectionPhase): void {
    logger.trace({ path: this.path, from: this.phase, to: phase }, 'Inspection phase change');
    this.phase = phase;
  }

  public userId(): string | undefined {
    return this.principal(this.req);
  }

  public report(
    category: SecurityEventCategory,
    detail: string,
    matchedValue: string | null,
    severity: SecurityEventSeverity
  ): void {
    this.dispatcher.dispatch(category, () =>
      this.sink.onSuspiciousActivity(this.req, category, detail, matchedValue, severity)
    );
  }

  public reportBodyFinding(
    category: SecurityEventCategory,
    detail: string,
    field: string,
    severity: SecurityEventSeverity
  ): void {
    this.dispatcher.dispatch(category, () =>
      this.sink.onSuspiciousActivity(
        category,
        detail,
        field,
        severity,
        this.path,
        this.method,
        this.clientIp,
        this.userAgent ?? '',
        this.userId()
      )
    );
  }

  public recordDataAccess(userId: string, areaTag: string, statusCode?: number): void {
    this.dispatcher.dispatch(areaTag, () =>
      this.sink.logDataAccess(userId, areaTag, this.path, this.method, statusCode)
    );
  }
}

/**
 * Request Inspector
 * Passive detector wrapped around the downstream handler. It reports what it
 * sees to the sink and never answers, delays beyond its own checks, or alters
 * the exchange. Errors from downstream are reported when security relevant
 * and always rethrown as the same object.
 */
export class RequestInspector {
  private readonly sink: SecurityEventSink;
  private readonly dispatcher: SinkDispatcher;
  private readonly principal: PrincipalResolver;
  private readonly clientIp: ClientIpResolver;
  private readonly exceptionClassifier: ExceptionClassifier;
  private readonly clock: () => number;
  private readonly preStages: readonly PreInvocationStage[];
  private readonly postStages: readonly PostInvocationStage[];

  constructor(config: RequestInspectorConfig) {
    this.sink = config.sink;
    this.dispatcher = new SinkDispatcher(config.sinkTimeoutMs ?? DEFAULT_SINK_TIMEOUT_MS);
    this.principal = config.principal ?? anonymousPrincipal;
    this.clientIp = config.clientIp ?? getClientIp;
    this.exceptionClassifier = config.exceptionClassifier ?? new ExceptionClassifier();
    this.clock = config.clock ?? Date.now;

    const classifier = config.userAgentClassifier ?? new UserAgentClassifier(config.registry);
    const formBodyScanner =
      config.formBodyScanner === undefined
        ? new FormBodyScanner(config.registry)
        : config.formBodyScanner;

    const preStages: PreInvocationStage[] = [
      urlThreatStage(config.registry),
      userAgentStage(classifier),
    ];
    if (formBodyScanner) {
      preStages.push(formBodyStage(formBodyScanner));
    }
    this.preStages = Object.freeze(preStages);

    this.postStages = Object.freeze([
      slowRequestStage(config.slowRequestThresholdMs ?? DEFAULT_SLOW_REQUEST_THRESHOLD_MS),
      sensitiveAreaStage(config.sensitivePathPrefixes ?? DEFAULT_SENSITIVE_PATH_PREFIXES),
      loginAccessStage(),
    ]);
  }

  /**
   * Inspect one request around the downstream handler
   */
  public async inspect(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    next: NextFunction
  ): Promise<void> {
    const ctx = new RequestInspection(
      req,
      res,
      this.sink,
      this.dispatcher,
      this.principal,
      this.clientIp
    );

    for (const stage of this.preStages) {
      try {
        await stage.run(ctx);
      } catch (error) {
        logger.error({ error, stage: stage.name, path: ctx.path }, 'Pre-invocation stage failed');
      }
    }
    ctx.enter('PreChecked');

    const downstreamReq = rewindRequest(req);
    const startedAt = this.clock();
    let failure: { error: unknown } | undefined;
    ctx.enter('Invoking');
    try {
      await next(downstreamReq);
    } catch (error) {
      failure = { error };
      this.classifyException(ctx, error);
      throw error;
    } finally {
      const outcome: InvocationOutcome = {
        elapsedMs: this.clock() - startedAt,
        error: failure?.error,
        cancelled: isCancelled(req, res),
      };
      this.runPostStages(ctx, outcome);
    }
  }

  /**
   * Middleware form for a promise-aware middleware chain
   */
  public middleware(): Middleware {
    return (req, res, next) => this.inspect(req, res, next);
  }

  /**
   * Sink calls that have neither settled nor timed out
   */
  public get inFlight(): number {
    return this.dispatcher.inFlight;
  }

  /**
   * Wait for outstanding sink calls, e.g. during shutdown
   */
  public drain(): Promise<void> {
    return this.dispatcher.drain();
  }

  private classifyException(ctx: RequestInspection, error: unknown): void {
    try {
      const classification = this.exceptionClassifier.classify(error);
      if (classification) {
        logger.warn(
          { path: ctx.path, kind: classification.kind },
          'Security-relevant error raised by downstream handler'
        );
        ctx.report(classification.category, classification.detail, null, classification.severity);
      }
      ctx.enter('ExceptionClassified');
    } catch (classifierError) {
      logger.error({ error: classifierError, path: ctx.path }, 'Exception classification failed');
    }
  }

  private runPostStages(ctx: RequestInspection, outcome: InvocationOutcome): void {
    if (outcome.cancelled) {
      logger.debug({ path: ctx.path }, 'Request cancelled by client, running post checks best-effort');
    }
    for (const stage of this.postStages) {
      try {
        stage.run(ctx, outcome);
      } catch (error) {
        logger.error({ error, stage: stage.name, path: ctx.path }, 'Post-invocation stage failed');
      }
    }
    ctx.enter('PostChecked');
    ctx.enter('Completed');
  }
}

function isCancelled(req: http.IncomingMessage, res: http.ServerResponse): boolean {
  return res.writableFinished === false && (req.destroyed === true || res.destroyed === true);
}
