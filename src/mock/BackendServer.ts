import http from 'http';
import express, { NextFunction, Request, Response } from 'express';
import logger from '../logging/Logger';
import { ArgumentError, UnauthorizedAccessError } from '../errors/SecurityErrors';

/**
 * Stand-in backend for local development of the monitoring gateway
 */
export class BackendServer {
  private app: express.Application;
  private port: number;
  private server?: http.Server;

  constructor(port: number = 4000) {
    this.app = express();
    this.port = port;
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(express.json());
    this.app.use(express.urlencoded({ extended: false }));
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.status(200).json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        service: 'backend',
      });
    });

    this.app.get('/api/songs', (_req: Request, res: Response) => {
      res.status(200).json({
        songs: [
          { id: 1, title: 'Opening Number', durationSeconds: 215 },
          { id: 2, title: 'Closing Number', durationSeconds: 342 },
        ],
      });
    });

    // Echo form posts so replayed bodies can be checked by hand
    this.app.post('/api/songs', (req: Request, res: Response) => {
      res.status(201).json({
        message: 'Song received',
        received: req.body,
        timestamp: new Date().toISOString(),
      });
    });

    this.app.get('/admin/settings', (req: Request, res: Response, next: NextFunction) => {
      if (!req.headers['authorization']) {
        next(new UnauthorizedAccessError('Administrator credentials required'));
        return;
      }
      res.status(200).json({ settings: { maintenanceMode: false } });
    });

    this.app.get('/api/slow', (req: Request, res: Response, next: NextFunction) => {
      const delayMs = Number(req.query.delayMs ?? 0);
      if (!Number.isFinite(delayMs) || delayMs < 0) {
        next(new ArgumentError('delayMs must be a non-negative number', 'delayMs'));
        return;
      }
      setTimeout(() => res.status(200).json({ delayedMs: delayMs }), delayMs);
    });

    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({
        error: 'Not Found',
        message: 'The requested resource does not exist',
      });
    });

    this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
      const status = err instanceof UnauthorizedAccessError ? 403 : 400;
      res.status(status).json({ error: err.name, message: err.message });
    });
  }

  public start(): void {
    this.server = this.app.listen(this.port, () => {
      logger.info(`Mock backend server listening on port ${this.port}`);
    });
  }

  public stop(): void {
    if (this.server) {
      this.server.close(() => {
        logger.info('Mock backend server stopped');
      });
    }
  }

  public getPort(): number {
    return this.port;
  }
}
