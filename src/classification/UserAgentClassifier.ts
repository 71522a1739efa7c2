import { DEFAULT_HEALTH_CHECK_PATHS } from '../config/Config';
import { PatternRegistry, findSignature } from '../patterns/PatternRegistry';
import { SecurityEventCategory, SecurityEventSeverity } from '../logging/SecurityEvents';

export type UserAgentClassification =
  | { verdict: 'exempt' }
  | { verdict: 'ordinary' }
  | { verdict: 'legitimate'; token: string }
  | {
      verdict: 'missing';
      category: SecurityEventCategory.MissingUserAgent;
      severity: SecurityEventSeverity.Low;
    }
  | {
      verdict: 'scanner';
      category: SecurityEventCategory.SecurityScannerUserAgent;
      severity: SecurityEventSeverity.High;
      token: string;
    }
  | {
      verdict: 'automation';
      category: SecurityEventCategory.SuspiciousAutomationUserAgent;
      severity: SecurityEventSeverity.Medium;
      token: string;
    };

export type ReportableClassification = Extract<UserAgentClassification, { severity: unknown }>;

export function isReportable(
  classification: UserAgentClassification
): classification is ReportableClassification {
  return 'severity' in classification;
}

export interface UserAgentClassifierOptions {
  /** Paths on which a missing User-Agent is expected (probes, load balancers) */
  healthCheckPaths?: readonly string[];
}

function normalisePath(path: string): string {
  const lowered = path.toLowerCase();
  return lowered.length > 1 && lowered.endsWith('/') ? lowered.slice(0, -1) : lowered;
}

export class UserAgentClassifier {
  private readonly healthCheckPaths: readonly string[];

  constructor(
    private readonly registry: PatternRegistry,
    options: UserAgentClassifierOptions = {}
  ) {
    this.healthCheckPaths = Object.freeze(
      (options.healthCheckPaths ?? DEFAULT_HEALTH_CHECK_PATHS).map(normalisePath)
    );
  }

  /**
   * Exact match or any sub-path of a configured health path
   */
  public isHealthCheckPath(requestPath: string): boolean {
    const path = normalisePath(requestPath);
    return this.healthCheckPaths.some(
      (healthPath) => path === healthPath || path.startsWith(`${healthPath}/`)
    );
  }

  /**
   * Classify a User-Agent header. The allowlist is consulted before either
   * denylist, so a recognised crawler or test client is never reported.
   */
  public classify(userAgent: string | undefined, requestPath: string): UserAgentClassification {
    const header = userAgent?.trim();

    if (!header) {
      if (this.isHealthCheckPath(requestPath)) {
        return { verdict: 'exempt' };
      }
      return {
        verdict: 'missing',
        category: SecurityEventCategory.MissingUserAgent,
        severity: SecurityEventSeverity.Low,
      };
    }

    const { legitimate, scanners, automation } = this.registry.userAgents;

    const allowed = findSignature(legitimate, header);
    if (allowed) {
      return { verdict: 'legitimate', token: allowed.label };
    }

    const scanner = findSignature(scanners, header);
    if (scanner) {
      return {
        verdict: 'scanner',
        category: SecurityEventCategory.SecurityScannerUserAgent,
        severity: SecurityEventSeverity.High,
        token: scanner.label,
      };
    }

    const automated = findSignature(automation, header);
    if (automated) {
      return {
        verdict: 'automation',
        category: SecurityEventCategory.SuspiciousAutomationUserAgent,
        severity: SecurityEventSeverity.Medium,
        token: automated.label,
      };
    }

    return { verdict: 'ordinary' };
  }
}
