import http from 'http';
import { existsSync } from 'fs';
import { loadConfig } from './config/Config';
import logger from './logging/Logger';
import { ProxyServer } from './proxy/ProxyServer';
import { BackendServer } from './mock/BackendServer';
import { createPatternRegistry } from './patterns/PatternRegistry';
import { UserAgentClassifier } from './classification/UserAgentClassifier';
import { FormBodyScanner } from './middleware/FormBodyScanner';
import { RequestInspector } from './middleware/RequestInspector';
import { StructuredSecurityEventSink } from './sink/StructuredSecurityEventSink';
import { JwtPrincipalResolver } from './auth/JwtPrincipalResolver';
import { PrincipalResolver, anonymousPrincipal } from './auth/PrincipalResolver';
import { Middleware, runMiddlewareChain } from './pipeline/MiddlewareChain';

/**
 * Request logging middleware
 */
function requestLoggingMiddleware(): Middleware {
  return async (req, res, next) => {
    const start = Date.now();

    logger.info({
      method: req.method,
      url: req.url,
      ip: req.socket.remoteAddress,
    }, 'Incoming request');

    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.info({
        method: req.method,
        url: req.url,
        statusCode: res.statusCode,
        duration,
      }, 'Request completed');
    });

    await next();
  };
}

/**
 * Health check endpoint middleware
 */
function healthCheckMiddleware(): Middleware {
  return async (req, res, next) => {
    if (req.url === '/health' && req.method === 'GET') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({
        status: 'healthy',
        service: 'tripwire-ts-gateway',
        timestamp: new Date().toISOString(),
      }));
      return;
    }
    await next();
  };
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  const config = loadConfig();

  logger.info({ config: {
    port: config.port,
    targetHost: config.targetHost,
    targetPort: config.targetPort,
    nodeEnv: config.nodeEnv,
    slowRequestThresholdMs: config.slowRequestThresholdMs,
  }}, 'Starting Tripwire-TS monitoring gateway');

  let backendServer: BackendServer | undefined;
  if (config.nodeEnv === 'development') {
    backendServer = new BackendServer(config.targetPort);
    backendServer.start();
  }

  let principal: PrincipalResolver = anonymousPrincipal;
  if (existsSync(config.jwtPublicKeyPath)) {
    principal = new JwtPrincipalResolver({
      publicKeyPath: config.jwtPublicKeyPath,
      issuer: config.jwtIssuer,
      audience: config.jwtAudience,
    }).toResolver();
  } else {
    logger.warn(
      { keyPath: config.jwtPublicKeyPath },
      'JWT public key not found. All requests will be treated as anonymous.'
    );
  }

  // Built once, shared read-only by every request
  const registry = createPatternRegistry();

  const inspector = new RequestInspector({
    registry,
    sink: new StructuredSecurityEventSink({ principal }),
    principal,
    userAgentClassifier: new UserAgentClassifier(registry, {
      healthCheckPaths: config.healthCheckPaths,
    }),
    formBodyScanner: new FormBodyScanner(registry, { maxScanBytes: config.formScanMaxBytes }),
    slowRequestThresholdMs: config.slowRequestThresholdMs,
    sensitivePathPrefixes: config.sensitivePathPrefixes,
    sinkTimeoutMs: config.sinkTimeoutMs,
  });

  const proxyServer = new ProxyServer({
    targetHost: config.targetHost,
    targetPort: config.targetPort,
  });

  // The inspector goes first so it observes every request, including the
  // ones answered by later middleware
  const middlewares: Middleware[] = [
    inspector.middleware(),
    requestLoggingMiddleware(),
    healthCheckMiddleware(),
  ];

  const server = http.createServer((req, res) => {
    runMiddlewareChain(middlewares, req, res, (request, response) =>
      proxyServer.handleRequest(request, response)
    ).catch((error: unknown) => {
      logger.error({ error }, 'Unhandled error in request pipeline');
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ error: 'Internal Server Error' }));
      }
    });
  });

  server.listen(config.port, () => {
    logger.info(`Tripwire-TS gateway listening on port ${config.port}`);
    logger.info(`Proxying requests to ${config.targetHost}:${config.targetPort}`);
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down gracefully...`);

    server.close(() => {
      logger.info('HTTP server closed');
    });

    await inspector.drain();
    proxyServer.stop();

    if (backendServer) {
      backendServer.stop();
    }

    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((error) => {
  logger.error({ error }, 'Failed to start application');
  process.exit(1);
});
