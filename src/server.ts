import express, { Request, Response } from 'express';
import http from 'http';
import { logger } from './utils/logger';
import { InputValidator } from './utils/InputValidator';
import { errorMessage } from './artifacts/core/errors';
import { TokenPipeline } from './batch/TokenPipeline';
import { ServerConfig } from './types/config';

export const INVALID_REQUEST_MESSAGE =
  'Invalid request. Provide NFT_CONTRACT_ADDRESS and FIRST_TOKEN_ID.\n';

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Express server that resolves token ranges on request:
 * GET /?NFT_CONTRACT_ADDRESS=0x...&FIRST_TOKEN_ID=1&LAST_TOKEN_ID=5
 */
export class Server {
  private readonly app: express.Application;
  private readonly pipeline: TokenPipeline;
  private readonly config: ServerConfig;
  private server: http.Server | null = null;

  constructor(pipeline: TokenPipeline, config: ServerConfig) {
    this.app = express();
    this.pipeline = pipeline;
    this.config = config;

    this.setupRoutes();
  }

  /**
   * Setup Express routes
   */
  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.status(200).json({
        status: 'ok',
        uptime: Math.floor(process.uptime()),
        timestamp: new Date().toISOString(),
      });
    });

    this.app.get('/', async (req: Request, res: Response) => {
      const contractAddress = queryString(req.query.NFT_CONTRACT_ADDRESS);
      const firstRaw = queryString(req.query.FIRST_TOKEN_ID);
      const lastRaw = queryString(req.query.LAST_TOKEN_ID) ?? firstRaw;

      const first = InputValidator.parseTokenId(firstRaw);
      const last = InputValidator.parseTokenId(lastRaw);

      if (!contractAddress || !InputValidator.isContractAddress(contractAddress) || first === null || last === null || !InputValidator.validateRange(first, last)) {
        logger.warn('Rejected request', { query: req.query });
        res.status(400).type('text/plain').send(INVALID_REQUEST_MESSAGE);
        return;
      }

      try {
        const summary = await this.pipeline.processRange(contractAddress, first, last);
        res.status(200).json(summary);
      } catch (error: unknown) {
        logger.error('Request failed', { error: errorMessage(error) });
        res.status(500).json({ error: errorMessage(error) });
      }
    });
  }

  /**
   * Start listening; resolves with the bound port
   */
  async start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host, () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.config.port;
        logger.info(`🚀 HTTP listener started on ${this.config.host}:${port}`);
        resolve(port);
      });
      server.on('error', reject);
      this.server = server;
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
    logger.info('🛑 Server shutting down...');
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
