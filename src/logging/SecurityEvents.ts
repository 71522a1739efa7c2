export enum SecurityEventSeverity {
  Low = 'Low',
  Medium = 'Medium',
  High = 'High',
}

export enum SecurityEventCategory {
  MaliciousUrlPattern = 'MaliciousUrlPattern',
  SecurityScannerUserAgent = 'SecurityScannerUserAgent',
  SuspiciousAutomationUserAgent = 'SuspiciousAutomationUserAgent',
  MissingUserAgent = 'MissingUserAgent',
  XSSPatternDetection = 'XSSPatternDetection',
  SQLInjectionPatternDetection = 'SQLInjectionPatternDetection',
  SecurityException = 'SecurityException',
  SlowRequest = 'SlowRequest',
  SensitiveAreaAccess = 'SensitiveAreaAccess',
}

const SEVERITY_RANK: Record<SecurityEventSeverity, number> = {
  [SecurityEventSeverity.Low]: 0,
  [SecurityEventSeverity.Medium]: 1,
  [SecurityEventSeverity.High]: 2,
};

/**
 * Orders severities from Low to High; negative when `a` ranks below `b`.
 */
export function compareSeverity(a: SecurityEventSeverity, b: SecurityEventSeverity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export interface SecurityEvent {
  category: SecurityEventCategory;
  severity: SecurityEventSeverity;
  detail: string;
  requestPath: string;
  httpMethod: string;
  clientIp: string;
  userAgent: string;
  userId?: string;
  /** Signature label that fired (URL and User-Agent detectors) */
  matchedValue?: string;
  /** Offending form field (body scanner) */
  field?: string;
  timestamp: string;
}

export interface DataAccessRecord {
  userId: string;
  area: string;
  path: string;
  method: string;
  statusCode?: number;
  timestamp: string;
}
