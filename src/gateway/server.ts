// ═══════════════════════════════════════════════════════════════
// Warden :: Gateway Server
// HTTP entry point for turns plus a WebSocket observer feed
// ═══════════════════════════════════════════════════════════════

import { WebSocketServer, WebSocket } from 'ws';
import express, { Request, Response, NextFunction, Router } from 'express';
import http from 'http';
import { v4 as uuid } from 'uuid';
import type { ApiKey, LoggerHandle } from '../core/types.js';
import { TurnRequestSchema } from '../core/types.js';
import { PolicyError, UpstreamError, errorMessage } from '../core/errors.js';
import type { Orchestrator } from '../core/orchestrator.js';
import type { PolicyStore } from '../policy/policy-store.js';
import { secretMatches } from './admin-routes.js';

interface ConnectedClient {
  id: string;
  ws: WebSocket;
  connectedAt: Date;
  lastPing: Date;
}

export interface FeedMessage {
  id: string;
  channel: string;
  payload: Record<string, unknown>;
  timestamp: Date;
}

export interface GatewayDependencies {
  orchestrator: Pick<Orchestrator, 'handleTurn'>;
  policy: Pick<PolicyStore, 'resolveKey' | 'isKeyActive'>;
  adminRoutes?: Router;
  logger: LoggerHandle;
}

export interface GatewayOptions {
  port: number;
  host: string;
  adminSecret: string;
  heartbeatMs?: number;
}

/** Shape of the errors express.json() hands to the error middleware. */
interface BodyParserError {
  status: number;
  type: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return typeof err === 'object' && err !== null
    && 'type' in err && typeof err.type === 'string'
    && 'status' in err && typeof err.status === 'number';
}

type KeyCheck = { ok: true; key: ApiKey } | { ok: false; status: 401 | 403; error: PolicyError };

export class GatewayServer {
  private app: express.Application;
  private server: http.Server;
  private wss: WebSocketServer;
  private clients: Map<string, ConnectedClient> = new Map();
  private deps: GatewayDependencies;
  private options: GatewayOptions;
  private logger: LoggerHandle;
  private heartbeat?: NodeJS.Timeout;

  constructor(deps: GatewayDependencies, options: GatewayOptions) {
    this.deps = deps;
    this.options = options;
    this.logger = deps.logger;
    this.app = express();
    this.app.use(express.json({ limit: '256kb' }));

    this.server = http.createServer(this.app);
    this.wss = new WebSocketServer({ server: this.server, path: '/ws' });

    this.setupHTTPRoutes();
    this.setupWebSocket();
  }

  // ── HTTP API Routes ──

  private setupHTTPRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({
        status: 'operational',
        uptime: process.uptime(),
        observers: this.clients.size,
        timestamp: new Date().toISOString(),
      });
    });

    this.app.post('/turn', (req: Request, res: Response) => {
      void this.handleTurn(req, res);
    });

    if (this.deps.adminRoutes) {
      this.app.use(this.deps.adminRoutes);
    }

    // Body parser failures arrive here
    this.app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(err);
        return;
      }
      if (isBodyParserError(err) && err.type === 'entity.too.large') {
        res.status(413).json({ error: 'Request body too large' });
        return;
      }
      if (err instanceof SyntaxError) {
        res.status(400).json({ error: 'Request body is not valid JSON' });
        return;
      }
      if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
        res.status(err.status).json({ error: 'Malformed request body' });
        return;
      }
      this.logger.error(`Unhandled gateway error: ${errorMessage(err)}`);
      res.status(500).json({ error: 'Internal error' });
    });
  }

  private authenticate(secret: string): KeyCheck {
    const key = this.deps.policy.resolveKey(secret);
    if (!key) return { ok: false, status: 401, error: new PolicyError('Unknown API key') };
    if (!this.deps.policy.isKeyActive(key)) {
      return { ok: false, status: 403, error: new PolicyError('API key revoked', key.keyId) };
    }
    return { ok: true, key };
  }

  private async handleTurn(req: Request, res: Response): Promise<void> {
    const parsed = TurnRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid turn request',
        details: parsed.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
      });
      return;
    }

    const auth = this.authenticate(parsed.data.apiKey);
    if (!auth.ok) {
      this.logger.warn(`Turn rejected: ${auth.error.message}`, {
        security: true, status: auth.status, keyId: auth.error.keyId,
      });
      res.status(auth.status).json({ error: auth.error.message, code: auth.error.code });
      return;
    }

    let callerGone = false;
    res.on('close', () => {
      if (!res.writableFinished) callerGone = true;
    });

    try {
      const reply = await this.deps.orchestrator.handleTurn({ prompt: parsed.data.prompt, apiKey: auth.key });
      if (callerGone) {
        this.logger.info(`Caller disconnected before reply for ${reply.correlationId}; turn still recorded`);
        return;
      }
      res.json({
        answer: reply.answer,
        correlationId: reply.correlationId,
        toolLoopExceeded: reply.toolLoopExceeded,
      });
    } catch (err) {
      if (callerGone) return;
      if (err instanceof UpstreamError) {
        res.status(502).json({ error: 'Upstream model unavailable', code: err.code, correlationId: err.correlationId });
        return;
      }
      this.logger.error(`Turn handling failed: ${errorMessage(err)}`);
      res.status(500).json({ error: 'Internal error' });
    }
  }

  // ── WebSocket ──

  private setupWebSocket(): void {
    this.wss.on('connection', (ws, req) => {
      if (!secretMatches(this.options.adminSecret, req.headers['x-admin-secret'])) {
        ws.close(1008, 'Unauthorized');
        return;
      }

      const clientId = uuid();
      const client: ConnectedClient = { id: clientId, ws, connectedAt: new Date(), lastPing: new Date() };
      this.clients.set(clientId, client);
      this.logger.info(`Observer connected: ${clientId} from ${req.socket.remoteAddress}`);

      this.sendToClient(clientId, 'system', { event: 'connected', clientId });

      ws.on('close', () => {
        this.clients.delete(clientId);
        this.logger.info(`Observer disconnected: ${clientId}`);
      });

      ws.on('pong', () => {
        client.lastPing = new Date();
      });
    });

    this.heartbeat = setInterval(() => {
      for (const [id, client] of this.clients) {
        if (client.ws.readyState === WebSocket.OPEN) {
          client.ws.ping();
        } else {
          this.clients.delete(id);
        }
      }
    }, this.options.heartbeatMs ?? 30_000);
    this.heartbeat.unref();
  }

  // ── Broadcast ──

  broadcast(channel: string, payload: Record<string, unknown>): void {
    const data = JSON.stringify(feedMessage(channel, payload));
    for (const client of this.clients.values()) {
      if (client.ws.readyState === WebSocket.OPEN) {
        client.ws.send(data);
      }
    }
  }

  private sendToClient(clientId: string, channel: string, payload: Record<string, unknown>): void {
    const client = this.clients.get(clientId);
    if (client && client.ws.readyState === WebSocket.OPEN) {
      client.ws.send(JSON.stringify(feedMessage(channel, payload)));
    }
  }

  // ── Lifecycle ──

  async start(): Promise<void> {
    return new Promise((resolve) => {
      this.server.listen(this.options.port, this.options.host, () => {
        const port = this.getPort();
        this.logger.info(`Gateway listening on ${this.options.host}:${port}`);
        this.logger.info(`  Turns: http://${this.options.host}:${port}/turn`);
        this.logger.info(`  Observer feed: ws://${this.options.host}:${port}/ws`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (this.heartbeat) clearInterval(this.heartbeat);
    for (const client of this.clients.values()) {
      client.ws.close(1001, 'Server shutting down');
    }
    this.clients.clear();

    return new Promise((resolve) => {
      this.wss.close(() => {
        this.server.close(() => {
          this.logger.info('Gateway stopped');
          resolve();
        });
      });
    });
  }

  getPort(): number {
    const address = this.server.address();
    return address !== null && typeof address === 'object' ? address.port : this.options.port;
  }

  getClientCount(): number {
    return this.clients.size;
  }

  getApp(): express.Application {
    return this.app;
  }
}

function feedMessage(channel: string, payload: Record<string, unknown>): FeedMessage {
  return { id: uuid(), channel, payload, timestamp: new Date() };
}
