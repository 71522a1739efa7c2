import http from 'http';
import httpProxy from 'http-proxy';
import logger from '../logging/Logger';

export interface ProxyConfig {
  targetHost: string;
  targetPort: number;
  timeout?: number;
}

/**
 * Forwards inspected requests to the protected backend. A request whose body
 * was read by the form scanner arrives here already rewound.
 */
export class ProxyServer {
  private proxy: httpProxy;
  private config: Required<ProxyConfig>;

  constructor(config: ProxyConfig) {
    this.config = {
      timeout: 30000, // 30 seconds default
      ...config,
    };

    this.proxy = httpProxy.createProxyServer({
      target: `http://${this.config.targetHost}:${this.config.targetPort}`,
      timeout: this.config.timeout,
      proxyTimeout: this.config.timeout,
      changeOrigin: true,
    });

    this.proxy.on('proxyRes', (proxyRes, req) => {
      logger.debug(
        {
          url: req.url,
          method: req.method,
          statusCode: proxyRes.statusCode,
        },
        'Request proxied successfully'
      );
    });
  }

  /**
   * Proxy one request; settles once the response has been sent or the
   * connection closed
   */
  public handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    return new Promise((resolve) => {
      res.once('finish', () => resolve());
      res.once('close', () => resolve());

      this.proxy.web(req, res, {}, (err) => {
        logger.error({ error: err.message, url: req.url }, 'Proxy error occurred');

        if (!res.headersSent) {
          res.writeHead(502, { 'Content-Type': 'application/json' });
          res.end(
            JSON.stringify({
              error: 'Bad Gateway',
              message: 'The gateway encountered an error while processing your request',
            })
          );
        }
        resolve();
      });
    });
  }

  public stop(): void {
    this.proxy.close();
  }
}
