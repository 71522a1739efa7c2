import http from 'http';
import { Readable } from 'stream';
import busboy from 'busboy';
import logger from '../logging/Logger';
import { PatternRegistry } from '../patterns/PatternRegistry';
import { SecurityEventCategory, SecurityEventSeverity } from '../logging/SecurityEvents';
import { readBody, rememberBody } from '../http/BodyReplay';

export interface FormBodyScannerConfig {
  maxScanBytes?: number;
}

export interface FormField {
  name: string;
  value: string;
}

export interface FormFinding {
  field: string;
  category: SecurityEventCategory;
  severity: SecurityEventSeverity;
  pattern: string;
}

export type FormScanSkipReason = 'not-applicable' | 'already-consumed' | 'too-large' | 'malformed';

export type FormScanResult =
  | { scanned: true; fieldCount: number; findings: FormFinding[] }
  | { scanned: false; reason: FormScanSkipReason; findings: [] };

const STATE_CHANGING_METHODS = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);
const FORM_CONTENT_TYPES = ['application/x-www-form-urlencoded', 'multipart/form-data'];

function skipped(reason: FormScanSkipReason): FormScanResult {
  return { scanned: false, reason, findings: [] };
}

/**
 * Form Body Scanner
 * Reads form fields of state-changing requests and matches each value
 * against the XSS and SQL injection grammars. The body is buffered once;
 * `rewindRequest()` gives downstream a request that reads it again.
 */
export class FormBodyScanner {
  private config: Required<FormBodyScannerConfig>;

  constructor(
    private readonly registry: PatternRegistry,
    config: FormBodyScannerConfig = {}
  ) {
    this.config = {
      maxScanBytes: config.maxScanBytes ?? 1048576, // 1MB default
    };
  }

  public static isApplicable(req: http.IncomingMessage): boolean {
    const method = (req.method || '').toUpperCase();
    if (!STATE_CHANGING_METHODS.has(method)) {
      return false;
    }
    const contentType = (req.headers['content-type'] || '').toLowerCase();
    return FORM_CONTENT_TYPES.some((type) => contentType.startsWith(type));
  }

  /**
   * Parse a buffered form body. Repeated field names are joined with ','.
   * File parts of multipart bodies are drained and ignored.
   */
  public parseFields(headers: http.IncomingHttpHeaders, body: Buffer): Promise<FormField[]> {
    return new Promise((resolve, reject) => {
      let parser: busboy.Busboy;
      try {
        parser = busboy({
          headers: { ...headers, 'content-type': headers['content-type'] ?? '' },
          limits: { fieldSize: this.config.maxScanBytes },
        });
      } catch (error) {
        reject(error);
        return;
      }

      const values = new Map<string, string[]>();
      parser.on('field', (name: string, value: string) => {
        const existing = values.get(name);
        if (existing) {
          existing.push(value);
        } else {
          values.set(name, [value]);
        }
      });
      parser.on('file', (_name: string, stream: Readable) => {
        stream.resume();
      });
      parser.on('close', () => {
        resolve([...values].map(([name, fieldValues]) => ({ name, value: fieldValues.join(',') })));
      });
      parser.on('error', (error: unknown) => reject(error));

      parser.end(body);
    });
  }

  public scanFields(fields: readonly FormField[]): FormFinding[] {
    const findings: FormFinding[] = [];
    for (const { name, value } of fields) {
      for (const match of this.registry.matchBodyThreats(value)) {
        if (match.matched) {
          findings.push({
            field: name,
            category: match.category,
            severity: match.severity,
            pattern: match.pattern,
          });
        }
      }
    }
    return findings;
  }

  /**
   * Buffer, parse and scan the request's form body
   */
  public async scan(req: http.IncomingMessage): Promise<FormScanResult> {
    if (!FormBodyScanner.isApplicable(req)) {
      return skipped('not-applicable');
    }

    if (req.readableEnded) {
      logger.debug({ url: req.url }, 'Request body already consumed, skipping form scan');
      return skipped('already-consumed');
    }

    const declaredLength = parseInt(req.headers['content-length'] || '', 10);
    if (declaredLength > this.config.maxScanBytes) {
      // Left unread: downstream consumes the original stream
      logger.debug(
        { url: req.url, declaredLength, maxScanBytes: this.config.maxScanBytes },
        'Form body exceeds scan limit, skipping form scan'
      );
      return skipped('too-large');
    }

    const { body, exceededLimit } = await readBody(req, this.config.maxScanBytes);

    if (exceededLimit) {
      // Bytes read so far are replayed ahead of the unread remainder
      rememberBody(req, body, req);
      logger.debug(
        { url: req.url, receivedBytes: body.length, maxScanBytes: this.config.maxScanBytes },
        'Form body exceeded scan limit while streaming, skipping form scan'
      );
      return skipped('too-large');
    }
    rememberBody(req, body);

    let fields: FormField[];
    try {
      fields = await this.parseFields(req.headers, body);
    } catch (error) {
      logger.warn({ error, url: req.url }, 'Unable to parse form body for pattern analysis');
      return skipped('malformed');
    }

    return { scanned: true, fieldCount: fields.length, findings: this.scanFields(fields) };
  }
}
