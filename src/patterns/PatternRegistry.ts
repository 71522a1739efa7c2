import { z } from 'zod';
import defaultSignatures from './signatures.json';
import { decodeQuery, safeDecode } from '../http/RequestInfo';
import { SecurityEventCategory, SecurityEventSeverity } from '../logging/SecurityEvents';

/**
 * A signature is either a plain substring or a labelled regular expression.
 * Both are matched case-insensitively.
 */
const signatureSchema = z.union([
  z.string().min(1),
  z.object({
    label: z.string().min(1),
    regex: z.string().min(1).refine((source) => {
      try {
        new RegExp(source, 'i');
        return true;
      } catch {
        return false;
      }
    }, 'Invalid regular expression'),
  }),
]);

export const signatureSetSchema = z.object({
  url: z.array(signatureSchema).min(1),
  xss: z.array(signatureSchema).min(1),
  sql: z.array(signatureSchema).min(1),
  userAgents: z.object({
    legitimate: z.array(z.string().min(1)),
    scanners: z.array(z.string().min(1)),
    automation: z.array(z.string().min(1)),
  }),
});

export type SignatureSet = z.infer<typeof signatureSetSchema>;
type SignatureSource = z.infer<typeof signatureSchema>;

export interface Signature {
  readonly label: string;
  /** `lowered` must be the lower-cased form of the scanned text */
  matches(lowered: string): boolean;
}

export type ThreatMatch =
  | {
      matched: true;
      category: SecurityEventCategory;
      severity: SecurityEventSeverity;
      pattern: string;
    }
  | { matched: false };

export const NO_MATCH: ThreatMatch = Object.freeze({ matched: false });

export interface PatternRegistry {
  readonly url: readonly Signature[];
  readonly xss: readonly Signature[];
  readonly sql: readonly Signature[];
  readonly userAgents: {
    readonly legitimate: readonly Signature[];
    readonly scanners: readonly Signature[];
    readonly automation: readonly Signature[];
  };
  matchUrlThreat(path: string, query: string): ThreatMatch;
  matchBodyThreat(fieldValue: string): ThreatMatch;
  matchBodyThreats(fieldValue: string): ThreatMatch[];
}

export interface PatternRegistryOptions {
  /** Inputs longer than this are truncated before matching */
  maxInputLength?: number;
}

export const DEFAULT_MAX_INPUT_LENGTH = 65536;

function compileSignature(source: SignatureSource): Signature {
  if (typeof source === 'string') {
    const needle = source.toLowerCase();
    return Object.freeze({
      label: source,
      matches: (lowered: string) => lowered.includes(needle),
    });
  }

  // Input is lower-cased before matching; the flag keeps character classes honest
  const expression = new RegExp(source.regex, 'i');
  return Object.freeze({
    label: source.label,
    matches: (lowered: string) => expression.test(lowered),
  });
}

function compileAll(sources: readonly SignatureSource[]): readonly Signature[] {
  return Object.freeze(sources.map(compileSignature));
}

/**
 * First signature (in declaration order) matching any of the given texts
 */
export function findSignature(
  signatures: readonly Signature[],
  ...texts: string[]
): Signature | undefined {
  const lowered = texts.map((text) => text.toLowerCase());
  return signatures.find((signature) => lowered.some((text) => signature.matches(text)));
}

/**
 * Validate a raw signature document, e.g. one read from a custom JSON file
 */
export function parseSignatureSet(raw: unknown): SignatureSet {
  return signatureSetSchema.parse(raw);
}

/**
 * Build the immutable registry once at startup and hand it to every consumer.
 * All returned objects are frozen and hold no per-request state.
 */
export function createPatternRegistry(
  signatures: SignatureSet = parseSignatureSet(defaultSignatures),
  options: PatternRegistryOptions = {}
): PatternRegistry {
  const maxInputLength = options.maxInputLength ?? DEFAULT_MAX_INPUT_LENGTH;
  const clip = (value: string): string =>
    value.length > maxInputLength ? value.substring(0, maxInputLength) : value;

  const url = compileAll(signatures.url);
  const xss = compileAll(signatures.xss);
  const sql = compileAll(signatures.sql);
  const userAgents = Object.freeze({
    legitimate: compileAll(signatures.userAgents.legitimate),
    scanners: compileAll(signatures.userAgents.scanners),
    automation: compileAll(signatures.userAgents.automation),
  });

  const bodyGrammars: ReadonlyArray<{
    signatures: readonly Signature[];
    category: SecurityEventCategory;
  }> = [
    { signatures: xss, category: SecurityEventCategory.XSSPatternDetection },
    { signatures: sql, category: SecurityEventCategory.SQLInjectionPatternDetection },
  ];

  const matchBodyThreats = (fieldValue: string): ThreatMatch[] => {
    if (!fieldValue) {
      return [];
    }
    const value = clip(fieldValue);
    const matches: ThreatMatch[] = [];
    for (const grammar of bodyGrammars) {
      const signature = findSignature(grammar.signatures, value);
      if (signature) {
        matches.push({
          matched: true,
          category: grammar.category,
          severity: SecurityEventSeverity.High,
          pattern: signature.label,
        });
      }
    }
    return matches;
  };

  return Object.freeze({
    url,
    xss,
    sql,
    userAgents,

    matchUrlThreat(path: string, query: string): ThreatMatch {
      const rawPath = clip(path);
      const rawQuery = clip(query);
      const signature = findSignature(
        url,
        rawPath,
        rawQuery,
        safeDecode(rawPath),
        decodeQuery(rawQuery)
      );
      if (!signature) {
        return NO_MATCH;
      }
      return {
        matched: true,
        category: SecurityEventCategory.MaliciousUrlPattern,
        severity: SecurityEventSeverity.High,
        pattern: signature.label,
      };
    },

    matchBodyThreat(fieldValue: string): ThreatMatch {
      return matchBodyThreats(fieldValue)[0] ?? NO_MATCH;
    },

    matchBodyThreats,
  });
}
