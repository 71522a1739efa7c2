import { ErrorKind, isTaggedError } from '../errors/SecurityErrors';
import { SecurityEventCategory, SecurityEventSeverity } from '../logging/SecurityEvents';

export interface ExceptionRule {
  category: SecurityEventCategory;
  severity: SecurityEventSeverity;
}

export interface ExceptionClassification extends ExceptionRule {
  kind: string;
  detail: string;
}

const SECURITY_EXCEPTION: ExceptionRule = Object.freeze({
  category: SecurityEventCategory.SecurityException,
  severity: SecurityEventSeverity.High,
});

/**
 * Error kinds that are reported before being rethrown.
 * 'invalid-argument' and untagged errors pass through unreported.
 */
export const DEFAULT_SECURITY_RELEVANT_KINDS: ReadonlyMap<ErrorKind, ExceptionRule> = new Map<
  ErrorKind,
  ExceptionRule
>([
  ['security', SECURITY_EXCEPTION],
  ['unauthorized-access', SECURITY_EXCEPTION],
  ['invalid-operation', SECURITY_EXCEPTION],
]);

export class ExceptionClassifier {
  private readonly rules: ReadonlyMap<string, ExceptionRule>;

  /**
   * @param additionalRules - extra kinds to report, or overrides for the defaults
   */
  constructor(additionalRules: Iterable<readonly [string, ExceptionRule]> = []) {
    this.rules = new Map<string, ExceptionRule>([
      ...DEFAULT_SECURITY_RELEVANT_KINDS,
      ...additionalRules,
    ]);
  }

  /**
   * Map a thrown value to the event it should raise, or null when it is not
   * security relevant. Untagged values are never reported.
   */
  public classify(error: unknown): ExceptionClassification | null {
    if (!isTaggedError(error)) {
      return null;
    }

    const rule = this.rules.get(error.kind);
    if (!rule) {
      return null;
    }

    return {
      kind: error.kind,
      category: rule.category,
      severity: rule.severity,
      detail: `Security-related exception occurred: ${error.name}`,
    };
  }
}
