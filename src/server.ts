import express, { Application, NextFunction, Request, Response } from 'express';
import * as http from 'http';
import { AppConfig, describeConfig } from './config';
import { loadRoster } from './config/roster';
import { LeaderboardController } from './controllers/LeaderboardController';
import { createLeaderboardRoutes } from './routes/leaderboardRoutes';
import { LeaderboardService, LeaderboardServiceOptions } from './services/LeaderboardService';
import { SettingsService } from './services/SettingsService';
import { WEBSOCKET_PATH, WebSocketService } from './services/WebSocketService';
import { PlayerRoster } from './types';

export interface ServerOptions {
  roster?: PlayerRoster;
  service?: Omit<LeaderboardServiceOptions, 'broadcaster'>;
  heartbeatIntervalMs?: number;
}

class LeaderboardServer {
  private app: Application;
  private server: http.Server;
  private config: AppConfig;
  private settings: SettingsService;
  private leaderboardService: LeaderboardService;
  private wsService: WebSocketService;
  private leaderboardController: LeaderboardController;
  private heartbeatIntervalMs: number;

  constructor(config: AppConfig, options: ServerOptions = {}) {
    this.config = config;
    this.app = express();
    this.server = http.createServer(this.app);
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 30000;

    this.settings = new SettingsService(config);
    this.wsService = new WebSocketService(this.server);
    this.leaderboardService = new LeaderboardService(this.settings, options.roster ?? loadRoster(), {
      ...options.service,
      broadcaster: this.wsService,
    });
    this.leaderboardController = new LeaderboardController(this.leaderboardService, this.settings);

    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(express.json());

    this.app.use((req, _res, next) => {
      console.log(`${req.method} ${req.path}`);
      next();
    });

    // CORS headers (adjust for production)
    this.app.use((req, res, next) => {
      res.header('Access-Control-Allow-Origin', '*');
      res.header('Access-Control-Allow-Methods', 'GET, POST, PUT, OPTIONS');
      res.header('Access-Control-Allow-Headers', 'Content-Type');
      if (req.method === 'OPTIONS') {
        res.sendStatus(200);
      } else {
        next();
      }
    });
  }

  private setupRoutes(): void {
    this.app.use('/api', createLeaderboardRoutes(this.leaderboardController));

    this.app.get('/', (_req, res) => {
      res.json({
        message: 'Crossword Leaderboard API',
        version: '1.0.0',
        endpoints: {
          leaderboard: {
            extract: 'POST /api/leaderboard/extract (image/jpeg, image/png, image/bmp body)',
            submit: 'POST /api/leaderboard/entries',
            recent: 'GET /api/leaderboard/entries?limit=10',
            roster: 'GET /api/roster',
          },
          settings: 'GET|PUT /api/settings',
          websocket: `ws://localhost:${this.config.port}${WEBSOCKET_PATH}`,
          health: 'GET /api/health',
        },
      });
    });

    this.app.use((_req, res) => {
      res.status(404).json({ error: 'Not found' });
    });

    // Body parser failures (malformed JSON, oversized image)
    this.app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(err);
        return;
      }
      const status = typeof err === 'object' && err !== null ? Number(Reflect.get(err, 'status')) : NaN;
      if (status === 400 || status === 413) {
        res.status(status).json({ error: status === 413 ? 'Payload too large' : 'Malformed request body' });
        return;
      }
      console.error('[Server] Unhandled error:', err);
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  /**
   * Start listening; resolves with the bound port.
   */
  start(port: number = this.config.port): Promise<number> {
    console.log('Starting Crossword Leaderboard Service...');
    console.log('Configuration:', describeConfig(this.config));

    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, () => {
        this.server.off('error', reject);
        this.wsService.startHeartbeat(this.heartbeatIntervalMs);

        const address = this.server.address();
        const boundPort = typeof address === 'object' && address !== null ? address.port : port;
        console.log(`\n✓ Server running on http://localhost:${boundPort}`);
        console.log(`✓ WebSocket server running on ws://localhost:${boundPort}${WEBSOCKET_PATH}`);
        resolve(boundPort);
      });
    });
  }

  async shutdown(): Promise<void> {
    console.log('Shutting down gracefully...');

    await this.wsService.close();

    await new Promise<void>((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
    console.log('Server shut down successfully');
  }
}

export default LeaderboardServer;
