import http from 'http';
import { Readable } from 'stream';

interface BufferedBody {
  /** Bytes read by the scanner */
  head: Buffer;
  /** Unread remainder of the request, when reading stopped at the limit */
  rest?: Readable;
}

const bufferedBodies = new WeakMap<http.IncomingMessage, BufferedBody>();

export function rememberBody(req: http.IncomingMessage, head: Buffer, rest?: Readable): void {
  bufferedBodies.set(req, { head, rest });
}

/**
 * Bytes read from the request so far, if an earlier stage buffered any
 */
export function bufferedBody(req: http.IncomingMessage): Buffer | undefined {
  return bufferedBodies.get(req)?.head;
}

async function* concatBody(head: Buffer, rest: Readable): AsyncGenerator<Buffer> {
  yield head;
  for await (const chunk of rest) {
    yield typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
  }
}

/**
 * A readable view of the request body. A fully buffered body can be replayed
 * any number of times. A body cut off at the scan limit is replayed once, as
 * the buffered bytes followed by the live remainder of the request.
 */
export function replayBody(req: http.IncomingMessage): Readable {
  const entry = bufferedBodies.get(req);
  if (!entry) {
    return req;
  }
  if (!entry.rest) {
    return Readable.from([entry.head], { objectMode: false });
  }
  bufferedBodies.delete(req);
  return Readable.from(concatBody(entry.head, entry.rest), { objectMode: false });
}

/**
 * Request handed downstream in place of one whose body was already read. It
 * carries the original request line, headers and socket, and streams the
 * replayed body with backpressure.
 */
class ReplayedRequest extends http.IncomingMessage {
  private readonly source: Readable;

  constructor(original: http.IncomingMessage, source: Readable) {
    super(original.socket);
    this.source = source;
    this.method = original.method;
    this.url = original.url;
    this.headers = original.headers;
    this.rawHeaders = original.rawHeaders;
    this.httpVersion = original.httpVersion;
    this.httpVersionMajor = original.httpVersionMajor;
    this.httpVersionMinor = original.httpVersionMinor;

    source.on('data', (chunk: Buffer) => {
      if (!this.push(chunk)) {
        source.pause();
      }
    });
    source.on('end', () => {
      this.complete = true;
      this.push(null);
    });
    source.on('error', (error: Error) => this.destroy(error));
  }

  _read(): void {
    this.source.resume();
  }
}

/**
 * The request to pass downstream: the original when its body is untouched,
 * otherwise a rewound copy that reads the same bytes
 */
export function rewindRequest(req: http.IncomingMessage): http.IncomingMessage {
  if (!bufferedBodies.has(req)) {
    return req;
  }
  return new ReplayedRequest(req, replayBody(req));
}

export interface ReadBodyResult {
  /** Bytes read; stops with the chunk that crossed `limit` */
  body: Buffer;
  /** True when reading stopped at the limit; the rest is left in the request */
  exceededLimit: boolean;
}

/**
 * Read the request stream into memory, up to `limit` bytes
 */
export function readBody(req: http.IncomingMessage, limit: number): Promise<ReadBodyResult> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let receivedBytes = 0;

    const cleanup = (): void => {
      req.removeListener('data', onData);
      req.removeListener('end', onEnd);
      req.removeListener('error', onError);
      req.removeListener('aborted', onAborted);
    };
    const onData = (chunk: Buffer | string): void => {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      receivedBytes += buffer.length;
      chunks.push(buffer);
      if (receivedBytes > limit) {
        cleanup();
        req.pause();
        resolve({ body: Buffer.concat(chunks), exceededLimit: true });
      }
    };
    const onEnd = (): void => {
      cleanup();
      resolve({ body: Buffer.concat(chunks), exceededLimit: false });
    };
    const onError = (error: Error): void => {
      cleanup();
      reject(error);
    };
    const onAborted = (): void => {
      cleanup();
      reject(new Error('Request aborted while reading body'));
    };

    req.on('data', onData);
    req.on('end', onEnd);
    req.on('error', onError);
    req.on('aborted', onAborted);
  });
}
