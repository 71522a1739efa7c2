import http from 'http';
import { RequestInspector, RequestInspectorConfig } from '../../src/middleware/RequestInspector';
import { createPatternRegistry } from '../../src/patterns/PatternRegistry';
import { SecurityEventSink } from '../../src/sink/SecurityEventSink';
import { replayBody } from '../../src/http/BodyReplay';
import {
  ArgumentError,
  SecurityError,
  UnauthorizedAccessError,
} from '../../src/errors/SecurityErrors';
import { SecurityEventCategory, SecurityEventSeverity } from '../../src/logging/SecurityEvents';
import logger from '../../src/logging/Logger';
import { createRequest, createResponse, readAll } from '../helpers/http';

const BROWSER = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';

describe('RequestInspector Middleware', () => {
  const registry = createPatternRegistry();
  let sink: {
    onSuspiciousActivity: jest.Mock;
    logDataAccess: jest.Mock;
  };
  let nextMock: jest.Mock<Promise<void>, []>;

  function createInspector(overrides: Partial<RequestInspectorConfig> = {}): RequestInspector {
    const eventSink: SecurityEventSink = sink;
    return new RequestInspector({ registry, sink: eventSink, ...overrides });
  }

  function browserRequest(url: string, method: string = 'GET'): http.IncomingMessage {
    return createRequest({ method, url, headers: { 'user-agent': BROWSER } });
  }

  beforeEach(() => {
    sink = {
      onSuspiciousActivity: jest.fn(),
      logDataAccess: jest.fn(),
    };
    nextMock = jest.fn(() => Promise.resolve());
  });

  describe('Benign requests', () => {
    test('should call next exactly once and report nothing', async () => {
      const inspector = createInspector();

      await inspector.inspect(browserRequest('/songs?page=2'), createResponse(), nextMock);

      expect(nextMock).toHaveBeenCalledTimes(1);
      expect(sink.onSuspiciousActivity).not.toHaveBeenCalled();
      expect(sink.logDataAccess).not.toHaveBeenCalled();
    });

    test('should produce the same outcome for repeated requests', async () => {
      const inspector = createInspector();

      await inspector.inspect(browserRequest('/files/../etc/passwd'), createResponse(), nextMock);
      await inspector.inspect(browserRequest('/files/../etc/passwd'), createResponse(), nextMock);

      expect(sink.onSuspiciousActivity).toHaveBeenCalledTimes(2);
      expect(sink.onSuspiciousActivity.mock.calls[0].slice(1)).toEqual(
        sink.onSuspiciousActivity.mock.calls[1].slice(1)
      );
    });
  });

  describe('URL threats', () => {
    test('should report path traversal once', async () => {
      const inspector = createInspector();
      const req = browserRequest('/files/../etc/passwd');

      await inspector.inspect(req, createResponse(), nextMock);

      expect(sink.onSuspiciousActivity).toHaveBeenCalledTimes(1);
      expect(sink.onSuspiciousActivity).toHaveBeenCalledWith(
        req,
        SecurityEventCategory.MaliciousUrlPattern,
        "Suspicious pattern '../' detected in request",
        '../',
        SecurityEventSeverity.High
      );
      expect(nextMock).toHaveBeenCalledTimes(1);
    });

    test('should report script tags in the query', async () => {
      const inspector = createInspector();
      const req = browserRequest('/search?q=<script>alert(1)</script>');

      await inspector.inspect(req, createResponse(), nextMock);

      expect(sink.onSuspiciousActivity).toHaveBeenCalledTimes(1);
      expect(sink.onSuspiciousActivity).toHaveBeenCalledWith(
        req,
        SecurityEventCategory.MaliciousUrlPattern,
        "Suspicious pattern '<script' detected in request",
        '<script',
        SecurityEventSeverity.High
      );
    });

    test('should report before calling next', async () => {
      const inspector = createInspector();
      nextMock.mockImplementation(() => {
        expect(sink.onSuspiciousActivity).toHaveBeenCalledTimes(1);
        return Promise.resolve();
      });

      await inspector.inspect(browserRequest('/a/..%2fsecret'), createResponse(), nextMock);

      expect(nextMock).toHaveBeenCalledTimes(1);
    });

    test('should decode the query around a stray percent sign', async () => {
      const inspector = createInspector();
      const req = browserRequest('/search?q=%3Cscript%3Ex%3C%2Fscript%3E&t=100%');

      await inspector.inspect(req, createResponse(), nextMock);

      expect(sink.onSuspiciousActivity).toHaveBeenCalledTimes(1);
      expect(sink.onSuspiciousActivity).toHaveBeenCalledWith(
        req,
        SecurityEventCategory.MaliciousUrlPattern,
        "Suspicious pattern '<script' detected in request",
        '<script',
        SecurityEventSeverity.High
      );
    });
  });

  describe('User-Agent checks', () => {
    test('should report scanners at high severity', async () => {
      const inspector = createInspector();
      const req = createRequest({
        url: '/products',
        headers: { 'user-agent': 'sqlmap/1.6.12' },
      });

      await inspector.inspect(req, createResponse(), nextMock);

      expect(sink.onSuspiciousActivity).toHaveBeenCalledWith(
        req,
        SecurityEventCategory.SecurityScannerUserAgent,
        'Security scanning tool detected in user agent: sqlmap/1.6.12',
        'sqlmap',
        SecurityEventSeverity.High
      );
    });

    test('should report automation at medium severity', async () => {
      const inspector = createInspector();
      const req = createRequest({ url: '/products', headers: { 'user-agent': 'curl/8.4.0' } });

      await inspector.inspect(req, createResponse(), nextMock);

      expect(sink.onSuspiciousActivity).toHaveBeenCalledWith(
        req,
        SecurityEventCategory.SuspiciousAutomationUserAgent,
        'Automated client detected in user agent: curl/8.4.0',
        'curl/',
        SecurityEventSeverity.Medium
      );
    });

    test('should report a missing User-Agent at low severity', async () => {
      const inspector = createInspector();
      const req = createRequest({ url: '/api/songs' });

      await inspector.inspect(req, createResponse(), nextMock);

      expect(sink.onSuspiciousActivity).toHaveBeenCalledTimes(1);
      expect(sink.onSuspiciousActivity).toHaveBeenCalledWith(
        req,
        SecurityEventCategory.MissingUserAgent,
        'Request has no User-Agent header',
        null,
        SecurityEventSeverity.Low
      );
    });

    test('should not report a missing User-Agent on health checks', async () => {
      const inspector = createInspector();

      await inspector.inspect(createRequest({ url: '/health' }), createResponse(), nextMock);

      expect(sink.onSuspiciousActivity).not.toHaveBeenCalled();
    });

    test('should not report allowlisted crawlers', async () => {
      const inspector = createInspector();
      const req = createRequest({
        url: '/songs',
        headers: { 'user-agent': 'Mozilla/5.0 (compatible; Googlebot/2.1)' },
      });

      await inspector.inspect(req, createResponse(), nextMock);

      expect(sink.onSuspiciousActivity).not.toHaveBeenCalled();
    });
  });

  describe('Form bodies', () => {
    test('should report SQL injection with the extracted request context', async () => {
      const inspector = createInspector({ principal: () => 'bob' });
      const body = `comment=${encodeURIComponent("'; DROP TABLE users; --")}`;
      const req = createRequest({
        method: 'POST',
        url: '/comments',
        headers: { 'user-agent': BROWSER, 'content-type': 'application/x-www-form-urlencoded' },
        body,
        remoteAddress: '198.51.100.4',
      });

      await inspector.inspect(req, createResponse(), nextMock);

      expect(sink.onSuspiciousActivity).toHaveBeenCalledTimes(1);
      expect(sink.onSuspiciousActivity).toHaveBeenCalledWith(
        SecurityEventCategory.SQLInjectionPatternDetection,
        'SQL injection pattern detected in field comment',
        'comment',
        SecurityEventSeverity.High,
        '/comments',
        'POST',
        '198.51.100.4',
        BROWSER,
        'bob'
      );
      expect((await readAll(replayBody(req))).toString()).toBe(body);
    });

    test('should report XSS in a field', async () => {
      const inspector = createInspector();
      const req = createRequest({
        method: 'POST',
        url: '/profile/bio',
        headers: { 'user-agent': BROWSER, 'content-type': 'application/x-www-form-urlencoded' },
        body: `bio=${encodeURIComponent('<script>alert(1)</script>')}`,
      });

      await inspector.inspect(req, createResponse(), nextMock);

      expect(sink.onSuspiciousActivity).toHaveBeenCalledWith(
        SecurityEventCategory.XSSPatternDetection,
        'XSS pattern detected in field bio',
        'bio',
        SecurityEventSeverity.High,
        '/profile/bio',
        'POST',
        '127.0.0.1',
        BROWSER,
        undefined
      );
    });

    test('should hand next a request that reads the scanned body', async () => {
      const inspector = createInspector();
      const body = `comment=${encodeURIComponent("1' OR 1=1 --")}&rating=5`;
      const req = createRequest({
        method: 'POST',
        url: '/comments?draft=1',
        headers: { 'user-agent': BROWSER, 'content-type': 'application/x-www-form-urlencoded' },
        body,
      });
      let received: http.IncomingMessage | undefined;
      let downstreamBody = '';
      const next = jest.fn(async (forwarded?: http.IncomingMessage) => {
        received = forwarded;
        downstreamBody = (await readAll(forwarded ?? req)).toString();
      });

      await inspector.inspect(req, createResponse(), next);

      expect(sink.onSuspiciousActivity).toHaveBeenCalledTimes(1);
      expect(received).not.toBe(req);
      expect(downstreamBody).toBe(body);
      expect(received?.method).toBe('POST');
      expect(received?.url).toBe('/comments?draft=1');
      expect(received?.headers['content-type']).toBe('application/x-www-form-urlencoded');
    });

    test('should leave the body untouched when scanning is disabled', async () => {
      const inspector = createInspector({ formBodyScanner: null });
      const req = createRequest({
        method: 'POST',
        url: '/comments',
        headers: { 'user-agent': BROWSER, 'content-type': 'application/x-www-form-urlencoded' },
        body: 'comment=<script>',
      });

      await inspector.inspect(req, createResponse(), nextMock);

      expect(sink.onSuspiciousActivity).not.toHaveBeenCalled();
      expect(replayBody(req)).toBe(req);
    });
  });

  describe('Exceptions', () => {
    test('should report and rethrow unauthorized access', async () => {
      const inspector = createInspector();
      const req = browserRequest('/orders/42');
      const error = new UnauthorizedAccessError('not your order');
      nextMock.mockRejectedValue(error);

      const outcome = inspector.inspect(req, createResponse(), nextMock);

      await expect(outcome).rejects.toBe(error);
      expect(sink.onSuspiciousActivity).toHaveBeenCalledTimes(1);
      expect(sink.onSuspiciousActivity).toHaveBeenCalledWith(
        req,
        SecurityEventCategory.SecurityException,
        'Security-related exception occurred: UnauthorizedAccessError',
        null,
        SecurityEventSeverity.High
      );
    });

    test('should rethrow argument errors without reporting', async () => {
      const inspector = createInspector();
      const error = new ArgumentError('page must be positive', 'page');
      nextMock.mockRejectedValue(error);

      await expect(
        inspector.inspect(browserRequest('/orders'), createResponse(), nextMock)
      ).rejects.toBe(error);
      expect(sink.onSuspiciousActivity).not.toHaveBeenCalled();
    });

    test('should rethrow untagged errors without reporting', async () => {
      const inspector = createInspector();
      const error = new Error('database unavailable');
      nextMock.mockRejectedValue(error);

      await expect(
        inspector.inspect(browserRequest('/orders'), createResponse(), nextMock)
      ).rejects.toBe(error);
      expect(sink.onSuspiciousActivity).not.toHaveBeenCalled();
    });

    test('should still run post checks after a failure', async () => {
      const clock = jest.fn().mockReturnValueOnce(0).mockReturnValueOnce(15000);
      const inspector = createInspector({ clock, principal: () => 'alice' });
      const error = new SecurityError('policy violated');
      nextMock.mockRejectedValue(error);

      await expect(
        inspector.inspect(browserRequest('/admin/users'), createResponse(), nextMock)
      ).rejects.toBe(error);

      const categories = sink.onSuspiciousActivity.mock.calls.map((call) => call[1]);
      expect(categories).toEqual([
        SecurityEventCategory.SecurityException,
        SecurityEventCategory.SlowRequest,
      ]);
      expect(sink.logDataAccess).toHaveBeenCalledWith(
        'alice',
        'SensitiveAreaAccess',
        '/admin/users',
        'GET',
        undefined
      );
    });
  });

  describe('Slow requests', () => {
    test('should report requests slower than the threshold', async () => {
      const clock = jest.fn().mockReturnValueOnce(1000).mockReturnValueOnce(13500);
      const inspector = createInspector({ clock });
      const req = browserRequest('/reports/yearly');

      await inspector.inspect(req, createResponse(), nextMock);

      expect(sink.onSuspiciousActivity).toHaveBeenCalledWith(
        req,
        SecurityEventCategory.SlowRequest,
        'Request to /reports/yearly took 12.50 seconds',
        null,
        SecurityEventSeverity.Medium
      );
    });

    test('should not report requests at the threshold', async () => {
      const clock = jest.fn().mockReturnValueOnce(0).mockReturnValueOnce(10000);
      const inspector = createInspector({ clock });

      await inspector.inspect(browserRequest('/reports/yearly'), createResponse(), nextMock);

      expect(sink.onSuspiciousActivity).not.toHaveBeenCalled();
    });

    test('should honour a configured threshold', async () => {
      const clock = jest.fn().mockReturnValueOnce(0).mockReturnValueOnce(750);
      const inspector = createInspector({ clock, slowRequestThresholdMs: 500 });

      await inspector.inspect(browserRequest('/reports/daily'), createResponse(), nextMock);

      expect(sink.onSuspiciousActivity).toHaveBeenCalledWith(
        expect.anything(),
        SecurityEventCategory.SlowRequest,
        'Request to /reports/daily took 0.75 seconds',
        null,
        SecurityEventSeverity.Medium
      );
    });
  });

  describe('Sensitive areas', () => {
    test('should record access by an authenticated user', async () => {
      const inspector = createInspector({ principal: () => 'alice' });
      const res = createResponse({ statusCode: 200, headersSent: true });

      await inspector.inspect(browserRequest('/admin/users'), res, nextMock);

      expect(sink.logDataAccess).toHaveBeenCalledTimes(1);
      expect(sink.logDataAccess).toHaveBeenCalledWith(
        'alice',
        'SensitiveAreaAccess',
        '/admin/users',
        'GET',
        200
      );
    });

    test('should match sensitive prefixes on the decoded path', async () => {
      const inspector = createInspector({ principal: () => 'alice' });

      await inspector.inspect(browserRequest('/%61dmin/users'), createResponse(), nextMock);

      expect(sink.logDataAccess).toHaveBeenCalledTimes(1);
      expect(sink.logDataAccess).toHaveBeenCalledWith(
        'alice',
        'SensitiveAreaAccess',
        '/%61dmin/users',
        'GET',
        undefined
      );
    });

    test('should match sensitive prefixes case-insensitively', async () => {
      const inspector = createInspector({ principal: () => 'alice' });

      await inspector.inspect(
        browserRequest('/Account/Settings', 'POST'),
        createResponse({ statusCode: 204, headersSent: true }),
        nextMock
      );

      expect(sink.logDataAccess).toHaveBeenCalledWith(
        'alice',
        'SensitiveAreaAccess',
        '/Account/Settings',
        'POST',
        204
      );
    });

    test('should not record anonymous access', async () => {
      const inspector = createInspector();

      await inspector.inspect(browserRequest('/admin/users'), createResponse(), nextMock);

      expect(sink.logDataAccess).not.toHaveBeenCalled();
    });

    test('should not record access outside sensitive areas', async () => {
      const inspector = createInspector({ principal: () => 'alice' });

      await inspector.inspect(browserRequest('/songs'), createResponse(), nextMock);

      expect(sink.logDataAccess).not.toHaveBeenCalled();
    });

    test('should use configured prefixes', async () => {
      const inspector = createInspector({
        principal: () => 'alice',
        sensitivePathPrefixes: ['/billing'],
      });

      await inspector.inspect(browserRequest('/admin/users'), createResponse(), nextMock);
      await inspector.inspect(browserRequest('/billing/invoices'), createResponse(), nextMock);

      expect(sink.logDataAccess).toHaveBeenCalledTimes(1);
      expect(sink.logDataAccess).toHaveBeenCalledWith(
        'alice',
        'SensitiveAreaAccess',
        '/billing/invoices',
        'GET',
        undefined
      );
    });
  });

  describe('Sink failures', () => {
    let errorSpy: jest.SpyInstance;

    beforeEach(() => {
      errorSpy = jest.spyOn(logger, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
      jest.restoreAllMocks();
    });

    test('should continue when the sink throws', async () => {
      sink.onSuspiciousActivity.mockImplementation(() => {
        throw new Error('sink offline');
      });
      const inspector = createInspector();

      await expect(
        inspector.inspect(browserRequest('/files/../etc/passwd'), createResponse(), nextMock)
      ).resolves.toBeUndefined();
      expect(nextMock).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalled();
    });

    test('should not wait for a slow sink', async () => {
      sink.onSuspiciousActivity.mockImplementation(() => new Promise<void>(() => undefined));
      const warnSpy = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
      const inspector = createInspector({ sinkTimeoutMs: 10 });

      await inspector.inspect(browserRequest('/files/../etc/passwd'), createResponse(), nextMock);

      expect(nextMock).toHaveBeenCalledTimes(1);
      expect(inspector.inFlight).toBe(1);
      expect(warnSpy).not.toHaveBeenCalled();

      await inspector.drain();

      expect(inspector.inFlight).toBe(0);
      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(warnSpy).toHaveBeenCalledWith(
        { sinkCall: SecurityEventCategory.MaliciousUrlPattern, timeoutMs: 10 },
        'Security event sink call exceeded timeout, continuing without it'
      );
    });

    test('should continue when the sink rejects', async () => {
      sink.onSuspiciousActivity.mockImplementation(() => Promise.reject(new Error('write failed')));
      const inspector = createInspector();

      await inspector.inspect(browserRequest('/files/../etc/passwd'), createResponse(), nextMock);
      await inspector.drain();

      expect(nextMock).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalled();
    });
  });

  describe('Cancelled requests', () => {
    test('should run post checks for a request the client abandoned', async () => {
      const clock = jest.fn().mockReturnValueOnce(0).mockReturnValueOnce(20000);
      const inspector = createInspector({ clock });
      const res = createResponse({ writableFinished: false, destroyed: true });

      await inspector.inspect(browserRequest('/exports/all'), res, nextMock);

      expect(sink.onSuspiciousActivity).toHaveBeenCalledWith(
        expect.anything(),
        SecurityEventCategory.SlowRequest,
        'Request to /exports/all took 20.00 seconds',
        null,
        SecurityEventSeverity.Medium
      );
    });
  });
});
