import express, { Request, Response, NextFunction } from 'express';
import { Server } from 'http';
import { MonitorError, errorMessage } from '../types/errors';
import type { MonitorErrorKind } from '../types/errors';
import type { BattleMonitor } from './BattleMonitor';
import { Logger } from './Logger';

const logger = new Logger('API');

export function httpStatusFor(kind: MonitorErrorKind): number {
  switch (kind) {
    case 'InvalidTag':
      return 400;
    case 'NotMonitored':
    case 'ProfileNotFound':
    case 'OpponentNotFound':
      return 404;
    case 'AlreadyMonitored':
      return 409;
    case 'ApiUnavailable':
      return 502;
    case 'StateStoreFailure':
      return 503;
  }
}

export function errorBody(error: unknown): { status: number; body: { error: string; kind?: string; tag?: string } } {
  if (error instanceof MonitorError) {
    return {
      status: httpStatusFor(error.kind),
      body: { error: error.message, kind: error.kind, tag: error.tag },
    };
  }
  return { status: 500, body: { error: 'Internal server error' } };
}

function readTag(body: unknown): string | null {
  if (typeof body !== 'object' || body === null) return null;
  const tag: unknown = Object.getOwnPropertyDescriptor(body, 'tag')?.value;
  return typeof tag === 'string' && tag.trim() !== '' ? tag : null;
}

/**
 * HTTP command surface for the monitor.
 *
 *   GET    /api/health
 *   GET    /api/monitors
 *   POST   /api/monitors                 { "tag": "#2PP" }
 *   DELETE /api/monitors/:tag            pause (add ?purge=true to delete)
 *   POST   /api/monitors/:tag/poll
 *   GET    /api/monitors/:tag/stats
 *   GET    /api/monitors/:tag/rivals     (?opponent=TAG for head-to-head)
 *
 * Tags in the path may omit the leading '#'.
 */
export class ApiServer {
  private app: express.Application;
  private server: Server | null = null;
  private monitor: BattleMonitor;
  private port: number;
  private apiKey: string;

  constructor(monitor: BattleMonitor, port: number = 3000, apiKey: string = '') {
    this.monitor = monitor;
    this.port = port;
    this.apiKey = apiKey;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(express.json());

    // Request logging
    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.path}`);
      next();
    });

    // API key authentication (if configured)
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      if (!this.apiKey) {
        return next();
      }

      const providedKey = req.headers['x-api-key'];
      if (providedKey !== this.apiKey) {
        logger.warn(`Unauthorized request from ${req.ip}`);
        res.status(401).json({ error: 'Unauthorized' });
        return;
      }
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/api/health', (_req: Request, res: Response) => {
      const subjects = this.monitor.listMonitored();
      res.json({
        status: 'ok',
        timestamp: Date.now(),
        subjects: subjects.length,
        active: subjects.filter((s) => s.status === 'active').length,
        limiter: this.monitor.getLimiterStats(),
      });
    });

    this.app.get('/api/monitors', (_req: Request, res: Response) => {
      this.handle(res, () => ({ success: true, subjects: this.monitor.listMonitored() }));
    });

    this.app.post('/api/monitors', async (req: Request, res: Response) => {
      const tag = readTag(req.body);
      if (!tag) {
        res.status(400).json({ error: 'Invalid payload: missing tag' });
        return;
      }
      try {
        const subject = await this.monitor.startMonitoring(tag);
        logger.info(`Monitoring started for #${subject.tag}`);
        res.status(201).json({ success: true, subject });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    this.app.delete('/api/monitors/:tag', async (req: Request, res: Response) => {
      try {
        if (req.query.purge === 'true') {
          const subject = await this.monitor.deleteSubject(req.params.tag);
          res.json({ success: true, deleted: subject.tag });
          return;
        }
        const subject = this.monitor.stopMonitoring(req.params.tag);
        res.json({ success: true, subject });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    this.app.post('/api/monitors/:tag/poll', async (req: Request, res: Response) => {
      try {
        const outcome = await this.monitor.pollNow(req.params.tag);
        res.json({ success: true, outcome });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    this.app.get('/api/monitors/:tag/stats', (req: Request, res: Response) => {
      this.handle(res, () => ({
        success: true,
        subject: this.monitor.getSubject(req.params.tag),
        stats: this.monitor.getStats(req.params.tag),
      }));
    });

    this.app.get('/api/monitors/:tag/rivals', (req: Request, res: Response) => {
      const opponent = req.query.opponent;
      this.handle(res, () =>
        typeof opponent === 'string' && opponent !== ''
          ? { success: true, rival: this.monitor.getRivals(req.params.tag, opponent) }
          : { success: true, rivals: this.monitor.getRivals(req.params.tag) },
      );
    });
  }

  private handle(res: Response, fn: () => object): void {
    try {
      res.json(fn());
    } catch (error) {
      this.sendError(res, error);
    }
  }

  private sendError(res: Response, error: unknown): void {
    const { status, body } = errorBody(error);
    if (status >= 500) {
      logger.error('Request failed', error);
    } else {
      logger.debug(`Request rejected (${status}): ${errorMessage(error)}`);
    }
    res.status(status).json(body);
  }

  /** Resolves with the bound port (useful when constructed with port 0). */
  async start(): Promise<number> {
    return new Promise((resolve) => {
      const server = this.app.listen(this.port, () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.port;
        logger.info(`API server listening on port ${port}`);
        if (this.apiKey) {
          logger.info('API key authentication enabled');
        } else {
          logger.warn('API key authentication disabled (no API_KEY configured)');
        }
        resolve(port);
      });
      this.server = server;
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        this.server = null;
        logger.info('API server stopped');
        resolve();
      });
    });
  }
}
