import express, { ErrorRequestHandler, Express, Request, Response } from 'express';
import { IncomingMessage, Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import type { GenerationService } from '../../application/services/GenerationService.js';
import { JobStatus, ProgressEvent, TERMINAL_STATUSES } from '../../core/entities/Job.js';
import {
  AdmissionError,
  InvalidTransitionError,
  InvariantViolationError,
  JobNotFoundError,
  ProviderError,
  RateLimitedError,
  ValidationError,
} from '../../core/errors.js';
import type { ProgressSubscription } from '../progress/ProgressPublisher.js';
import { Logger, silentLogger } from '../../utils/logger.js';

export interface WebServerOptions {
  port: number;
  maxUploadBytes: number;
  logger: Logger;
  onFatal: (error: Error) => void;
}

const JOB_STATUSES: readonly JobStatus[] = ['queued', 'running', ...TERMINAL_STATUSES];

/**
 * REST API and per-job WebSocket progress stream.
 */
export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();
  private readonly options: WebServerOptions;

  constructor(
    private service: GenerationService,
    options: Partial<WebServerOptions> = {}
  ) {
    this.options = {
      port: 8000,
      maxUploadBytes: 10 * 1024 * 1024,
      logger: silentLogger,
      onFatal: (error) => {
        setImmediate(() => {
          throw error;
        });
      },
      ...options,
    };
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json({ limit: '1mb' }));
  }

  private setupRoutes(): void {
    // API: Model catalog with prices
    this.app.get('/api/models', (req: Request, res: Response) => {
      res.json({ models: this.service.getModels() });
    });

    // API: Upload an input image (raw body)
    this.app.post(
      '/api/upload',
      express.raw({ type: 'image/*', limit: this.options.maxUploadBytes + 1 }),
      async (req: Request, res: Response) => {
        try {
          const body: unknown = req.body;
          if (!Buffer.isBuffer(body)) {
            throw new ValidationError('Send the image as the raw request body with an image/* Content-Type');
          }
          const stored = await this.service.uploadImage(identityOf(req), body, req.get('X-Filename') ?? 'upload');
          res.status(201).json({
            file_id: stored.fileId,
            filename: stored.fileName,
            size: stored.size,
            content_type: stored.contentType,
          });
        } catch (error) {
          this.sendError(res, error);
        }
      }
    );

    // API: Submit a generation
    this.app.post('/api/generate', async (req: Request, res: Response) => {
      try {
        const result = await this.service.submit(identityOf(req), req.body);
        res.status(202).json({
          job_id: result.jobId,
          status: result.status,
          fingerprint: result.fingerprint,
          deduplicated: result.deduplicated,
          cached: result.cached,
          estimated_cost_usd: result.estimatedCostUsd,
        });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: List jobs
    this.app.get('/api/jobs', (req: Request, res: Response) => {
      try {
        const status = req.query.status;
        if (status !== undefined && !isJobStatus(status)) {
          throw new ValidationError(`status must be one of ${JOB_STATUSES.join(', ')}`);
        }
        res.json({ jobs: this.service.listJobs(identityOf(req), status) });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Get job by ID
    this.app.get('/api/jobs/:id', (req: Request, res: Response) => {
      try {
        res.json(this.service.getStatus(identityOf(req), req.params.id));
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Cancel job
    this.app.post('/api/jobs/:id/cancel', (req: Request, res: Response) => {
      try {
        const { job, outcome } = this.service.cancel(identityOf(req), req.params.id);
        res.json({ ...job, cancel_outcome: outcome });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Save a finished video and its metadata under the output directory
    this.app.post('/api/jobs/:id/download', async (req: Request, res: Response) => {
      try {
        const archived = await this.service.downloadResult(identityOf(req), req.params.id);
        res.status(201).json({
          job_id: archived.jobId,
          video_path: archived.videoPath,
          metadata_path: archived.metadataPath,
          size: archived.size,
          sha256: archived.sha256,
        });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Drop a cached result
    this.app.delete('/api/cache/:fingerprint', async (req: Request, res: Response) => {
      try {
        const invalidated = await this.service.invalidateCache(identityOf(req), req.params.fingerprint);
        res.json({ fingerprint: req.params.fingerprint, invalidated });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Health and statistics
    this.app.get('/api/health', async (req: Request, res: Response) => {
      try {
        res.json(await this.service.getHealth());
      } catch (error) {
        this.sendError(res, error);
      }
    });

    const bodyErrors: ErrorRequestHandler = (error: unknown, req, res, next) => {
      if (res.headersSent) {
        next(error);
        return;
      }
      const status = httpStatusOf(error);
      if (status === 413) {
        res.status(413).json({ error: 'payload_too_large', message: 'Request body is too large' });
        return;
      }
      if (status === 400) {
        res.status(400).json({ error: 'invalid_request', message: 'Request body could not be parsed' });
        return;
      }
      this.sendError(res, error);
    };
    this.app.use(bodyErrors);
  }

  private sendError(res: Response, error: unknown): void {
    if (error instanceof RateLimitedError) {
      res.setHeader('Retry-After', String(error.retryAfterSeconds));
      res.status(429).json({ error: error.code, retry_after: error.retryAfterSeconds, message: error.message });
      return;
    }
    if (error instanceof ValidationError) {
      res.status(error.httpStatus).json({ error: error.code, message: error.message, issues: error.issues });
      return;
    }
    if (error instanceof AdmissionError) {
      res.status(error.httpStatus).json({ error: error.code, message: error.message });
      return;
    }
    if (error instanceof JobNotFoundError) {
      res.status(404).json({ error: 'not_found', message: error.message });
      return;
    }
    if (error instanceof ProviderError) {
      this.options.logger.warn('Upstream request failed:', error.message);
      res.status(502).json({ error: 'upstream_failed', message: error.userMessage });
      return;
    }

    this.options.logger.error('Request failed:', error);
    res.status(500).json({ error: 'internal_error', message: 'Internal server error' });

    if (error instanceof InvalidTransitionError || error instanceof InvariantViolationError) {
      this.options.onFatal(error);
    }
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer, path: '/ws' });

    this.wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
      this.clients.add(ws);

      ws.on('close', () => {
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        this.options.logger.error('WebSocket error:', error);
        this.clients.delete(ws);
      });

      const jobId = new URL(req.url ?? '/ws', 'http://localhost').searchParams.get('job_id');
      if (!jobId) {
        ws.send(JSON.stringify({ type: 'error', message: 'job_id query parameter is required' }));
        ws.close(1008, 'job_id required');
        return;
      }

      let subscription: ProgressSubscription;
      try {
        subscription = this.service.subscribe(jobId);
      } catch (error) {
        const message = error instanceof JobNotFoundError ? error.message : 'Could not subscribe to job';
        ws.send(JSON.stringify({ type: 'error', message }));
        ws.close(1008, 'unknown job');
        return;
      }

      this.options.logger.debug(`WebSocket client subscribed to job ${jobId}`);
      ws.on('close', () => subscription.close());

      void this.streamProgress(ws, subscription).catch((error: unknown) => {
        this.options.logger.error(`Progress stream for job ${jobId} failed:`, error);
      });
    });
  }

  private async streamProgress(ws: WebSocket, subscription: ProgressSubscription): Promise<void> {
    try {
      for await (const event of subscription) {
        if (ws.readyState !== WebSocket.OPEN) break;
        ws.send(JSON.stringify(toWireEvent(event)));
      }
    } finally {
      subscription.close();
      if (ws.readyState === WebSocket.OPEN) {
        ws.close(1000, 'Job finished');
      }
    }
  }

  public start(): Promise<number> {
    return new Promise((resolve, reject) => {
      try {
        const server = this.app.listen(this.options.port, () => {
          const port = this.getPort();
          this.options.logger.info(`API available at http://localhost:${port}`);
          this.setupWebSocket();
          resolve(port);
        });
        this.httpServer = server;

        server.on('error', (error) => {
          this.options.logger.error('Server error:', error);
          reject(error);
        });
      } catch (error) {
        reject(error);
      }
    });
  }

  public getPort(): number {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : this.options.port;
  }

  public stop(): Promise<void> {
    return new Promise((resolve) => {
      // Close all WebSocket connections
      this.clients.forEach((client) => {
        client.close(1001, 'Server shutting down');
      });
      this.clients.clear();

      // Close WebSocket server
      if (this.wss) {
        this.wss.close();
        this.wss = null;
      }

      // Close HTTP server
      const server = this.httpServer;
      this.httpServer = null;
      if (server) {
        server.closeAllConnections();
        server.close(() => {
          this.options.logger.info('HTTP server closed');
          resolve();
        });
      } else {
        resolve();
      }
    });
  }
}

function identityOf(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

function isJobStatus(value: unknown): value is JobStatus {
  return typeof value === 'string' && JOB_STATUSES.some((status) => status === value);
}

function httpStatusOf(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return null;
}

function toWireEvent(event: ProgressEvent) {
  return {
    type: 'progress',
    job_id: event.jobId,
    status: event.status,
    progress_percent: event.progress,
    message: event.message,
    timestamp: event.timestamp,
  };
}
