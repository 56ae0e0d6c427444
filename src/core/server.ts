import express, { type Express, type Request, type Response } from 'express';
import type { Server } from 'node:http';
import type { ProxyConfig, TapeRequest, TapeResponse } from '../types/index.js';
import type { Recorder } from './recorder.js';
import type { InterceptResult } from './interceptor.js';
import {
  createForwarder,
  flattenHeaders,
  withoutHeaders,
  HOP_BY_HOP_HEADERS,
  PLAYBACK_EXCLUDED_HEADERS,
  SOURCE_HEADER,
  SOURCE_LABELS,
  type FetchFunction,
} from './http.js';
import { ConfigError, NonWritableTapeError, errorMessage } from './errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface TapeProxyEvents {
  onRequest?: (req: TapeRequest) => void;
  onResponse?: (req: TapeRequest, res: TapeResponse, result: InterceptResult['source']) => void;
  onError?: (error: Error, req: TapeRequest) => void;
  onStart?: (port: number) => void;
  onStop?: () => void;
}

export interface TapeProxyOptions extends Partial<ProxyConfig> {
  /** Underlying fetch for live calls */
  fetch?: FetchFunction;
  logger?: Logger;
}

/**
 * HTTP proxy that sends every request through a recorder's pipeline and
 * forwards live calls to a fixed target.
 */
export class TapeProxy {
  private config: ProxyConfig & { target: string };
  private app: Express;
  private server: Server | null = null;
  private recorder: Recorder;
  private events: TapeProxyEvents;
  private logger: Logger;
  private fetchFn: FetchFunction | undefined;

  constructor(recorder: Recorder, options: TapeProxyOptions = {}, events: TapeProxyEvents = {}) {
    const defaults = recorder.getConfig().proxy;
    const target = options.target ?? defaults.target;

    if (!target) {
      throw new ConfigError('Target URL is required for the proxy');
    }

    this.config = {
      port: options.port ?? defaults.port,
      target: target.replace(/\/+$/, ''),
      timeout: options.timeout ?? defaults.timeout,
    };
    this.recorder = recorder;
    this.events = events;
    this.logger = options.logger ?? createLogger(recorder.getConfig().logLevel);
    this.fetchFn = options.fetch;
    this.app = express();

    this.setupMiddleware();
  }

  /**
   * Setup Express middleware
   */
  private setupMiddleware(): void {
    // Bodies are recorded verbatim as text, whatever their content type
    this.app.use(express.text({ type: () => true, limit: '10mb' }));

    // Health check endpoint
    this.app.get('/__health', (_req: Request, res: Response) => {
      res.json({
        status: 'ok',
        target: this.config.target,
        intercepting: this.recorder.getPipeline().isIntercepting(),
      });
    });

    // Active tape endpoint
    this.app.get('/__tape', (_req: Request, res: Response) => {
      if (!this.recorder.isActive()) {
        res.status(404).json({ error: 'Not Found', message: 'No tape is inserted' });
        return;
      }
      const tape = this.recorder.currentTape();
      res.json({
        name: tape.name,
        mode: tape.mode,
        size: tape.size(),
        readCursor: tape.readCursor,
      });
    });

    const forward = createForwarder({
      fetch: this.fetchFn,
      timeout: this.config.timeout,
      redirect: 'manual',
    });

    this.app.use(async (req: Request, res: Response) => {
      const request = this.createTapeRequest(req);
      this.events.onRequest?.(request);

      try {
        const result = await this.recorder.getPipeline().dispatch(request, forward);
        this.events.onResponse?.(request, result.response, result.source);
        this.sendResult(res, result);
      } catch (error) {
        this.handleError(error, request, res);
      }
    });
  }

  private createTapeRequest(req: Request): TapeRequest {
    const request: TapeRequest = {
      method: req.method,
      url: `${this.config.target}${req.originalUrl}`,
      headers: withoutHeaders(flattenHeaders(req.headers), HOP_BY_HOP_HEADERS),
    };

    const body: unknown = req.body;
    if (typeof body === 'string' && body !== '') {
      request.body = body;
    }

    return request;
  }

  private sendResult(res: Response, result: InterceptResult): void {
    const { response, source } = result;

    res.status(response.status);

    // Set headers (excluding ones that describe the original encoding)
    for (const [key, value] of Object.entries(withoutHeaders(response.headers, PLAYBACK_EXCLUDED_HEADERS))) {
      res.setHeader(key, value);
    }
    res.setHeader(SOURCE_HEADER, SOURCE_LABELS[source]);

    res.send(response.body);
  }

  /**
   * Tape policy rejections become 403, anything else from the live side 502
   */
  private handleError(error: unknown, request: TapeRequest, res: Response): void {
    const err = error instanceof Error ? error : new Error(String(error));
    this.events.onError?.(err, request);

    if (res.headersSent) {
      this.logger.error(`Response already sent for ${request.method} ${request.url}`, err);
      return;
    }

    if (err instanceof NonWritableTapeError) {
      this.logger.warn(err.message);
      res.status(403).json({ error: 'Forbidden', message: err.message });
      return;
    }

    this.logger.error(`Proxy error for ${request.method} ${request.url}: ${errorMessage(err)}`);
    res.status(502).json({
      error: 'Bad Gateway',
      message: errorMessage(err),
    });
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    if (this.server) {
      throw new Error('Proxy is already running');
    }

    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, () => {
        this.server = server;
        const port = this.port();
        this.logger.info(`Proxy listening on port ${port}, forwarding to ${this.config.target}`);
        this.events.onStart?.(port);
        resolve();
      });

      server.on('error', (error) => {
        this.server = null;
        reject(error);
      });
    });
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
        } else {
          this.server = null;
          this.events.onStop?.();
          resolve();
        }
      });
    });
  }

  /**
   * Port the server listens on; resolves port 0 to the one actually bound
   */
  port(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }

  running(): boolean {
    return this.server !== null;
  }

  getConfig(): ProxyConfig {
    return { ...this.config };
  }

  /**
   * Get the Express app instance (for advanced usage)
   */
  getApp(): Express {
    return this.app;
  }
}
