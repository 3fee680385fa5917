/**
 * Express REST API Server
 * Provides the prediction endpoint and the readiness probe
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import { createServer, type Server as HttpServer } from 'http';
import { fileURLToPath } from 'url';
import { assertConfigured, validateConfig, type AppConfig } from '../config/config.js';
import { describeError, errorStatus, redactSecret } from '../errors.js';
import { validateFeatures } from '../scoring/validator.js';
import { RemoteScorer, type Scorer } from '../scoring/remote-scorer.js';
import {
  FEATURE_DESCRIPTIONS,
  FEATURE_NAMES,
  type HealthReport,
  type PredictFailure,
  type PredictSuccess,
} from '../types/index.js';

// ============================================
// Types
// ============================================

export interface ApiServerDeps {
  /** Defaults to a RemoteScorer over config.scoring */
  scorer?: Scorer;
}

/** Form page and its script; same relative location from src/server and dist/server */
const PUBLIC_DIR = fileURLToPath(new URL('../../public', import.meta.url));

/**
 * body-parser marks its own errors with a status and a type
 */
function isBodyParserError(err: unknown): err is Error & { status: number; type: string } {
  return err instanceof Error && 'status' in err && 'type' in err && typeof err.status === 'number';
}

// ============================================
// API Server
// ============================================

export class ApiServer {
  private app: Express;
  private server: HttpServer;
  private config: AppConfig;
  private scorer: Scorer;

  constructor(config: AppConfig, deps: ApiServerDeps = {}) {
    this.config = config;
    this.scorer = deps.scorer ?? new RemoteScorer(config.scoring);

    this.app = express();
    this.server = createServer(this.app);

    this.setupMiddleware();
    this.setupRoutes();
  }

  // ----------------------------------------
  // Middleware
  // ----------------------------------------

  private setupMiddleware(): void {
    const { corsOrigins, debug } = this.config.server;

    if (corsOrigins.length > 0) {
      this.app.use(cors({
        origin: corsOrigins,
      }));
    }
    this.app.use(express.json());

    if (debug) {
      this.app.use((req: Request, res: Response, next: NextFunction) => {
        const startTime = Date.now();
        res.on('finish', () => {
          console.log(`${req.method} ${req.path} ${res.statusCode} ${Date.now() - startTime}ms`);
        });
        next();
      });
    }
  }

  // ----------------------------------------
  // Routes
  // ----------------------------------------

  private setupRoutes(): void {
    // Prediction form
    this.app.use(express.static(PUBLIC_DIR));

    // Readiness: configuration only, no call to the model endpoint
    this.app.get('/health', (_req: Request, res: Response) => {
      const { valid, errors, warnings } = validateConfig(this.config);

      const report: HealthReport = valid
        ? { status: 'healthy', app: this.config.appName, version: this.config.appVersion, warnings }
        : { status: 'unhealthy', errors, warnings };

      res.status(valid ? 200 : 500).json(report);
    });

    // Feature list for the input form
    this.app.get('/api/features', (_req: Request, res: Response) => {
      const features = FEATURE_NAMES.map((name) => ({
        name,
        description: FEATURE_DESCRIPTIONS[name],
      }));
      res.json({ features, count: features.length });
    });

    // Predict
    this.app.post('/predict', async (req: Request, res: Response) => {
      const validation = validateFeatures(req.body);
      if (!validation.ok) {
        return this.sendFailure(res, validation.error);
      }

      try {
        assertConfigured(this.config);
        const prediction = await this.scorer.score(validation.vector);
        const body: PredictSuccess = { success: true, prediction };
        res.json(body);
      } catch (error) {
        console.error('Prediction failed:', this.redact(describeError(error)));
        this.sendFailure(res, error);
      }
    });

    // Error handler
    this.app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      if (isBodyParserError(err) && err.status < 500) {
        const error = err.type === 'entity.parse.failed' ? 'Request body must be valid JSON' : err.message;
        const body: PredictFailure = { success: false, error };
        return res.status(err.status).json(body);
      }

      console.error('API Error:', this.redact(describeError(err)));
      const body: PredictFailure = { success: false, error: 'Internal server error' };
      res.status(500).json(body);
    });
  }

  private sendFailure(res: Response, error: unknown): void {
    const body: PredictFailure = { success: false, error: this.redact(describeError(error)) };
    res.status(errorStatus(error)).json(body);
  }

  private redact(text: string): string {
    return redactSecret(text, this.config.scoring.token);
  }

  // ----------------------------------------
  // Integration
  // ----------------------------------------

  getApp(): Express {
    return this.app;
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async start(): Promise<void> {
    const { port, host } = this.config.server;

    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, host, () => {
        this.server.off('error', reject);
        console.log(`API server running at http://${host}:${this.getPort()}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.server.listening) return;

    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /**
   * Bound port once listening (differs from the configured one when that is 0)
   */
  getPort(): number {
    const address = this.server.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.server.port;
  }
}
