// ═══════════════════════════════════════════════════════════════
// Warden :: Admin API
// Operator routes for policy, keys, audit and scoring visibility.
// Every route sits behind the x-admin-secret header.
// ═══════════════════════════════════════════════════════════════

import { timingSafeEqual } from 'crypto';
import { Router, Request, Response, NextFunction } from 'express';
import type { ApiKey, LoggerHandle } from '../core/types.js';
import { InvalidPolicyError, UnknownKeyError, errorMessage } from '../core/errors.js';
import type { PolicyStore } from '../policy/policy-store.js';
import type { AuditTrail } from '../protocols/audit-trail.js';
import type { ScoringDispatcher } from '../watchdog/dispatcher.js';
import type { Orchestrator } from '../core/orchestrator.js';

// ── Dependency injection interface ──

export interface AdminDependencies {
  policy: Pick<PolicyStore, 'listAgents' | 'listKeys' | 'revokeKey' | 'getSnapshot'>;
  auditTrail: Pick<AuditTrail, 'getRecent' | 'getByCorrelationId' | 'verifyChain' | 'getCount'>;
  scoring: Pick<ScoringDispatcher, 'getStats'>;
  orchestrator: Pick<Orchestrator, 'getState'>;
  /** Re-reads the policy source and applies it. */
  reloadPolicy(): void;
  adminSecret: string;
  logger: LoggerHandle;
}

export function secretMatches(expected: string, provided: unknown): boolean {
  if (typeof provided !== 'string' || expected.length === 0) return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** 503 when no secret is configured, 401 on a wrong one. */
export function requireAdminSecret(secret: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!secret) {
      res.status(503).json({ error: 'Admin API disabled: no admin secret configured' });
      return;
    }
    if (!secretMatches(secret, req.headers['x-admin-secret'])) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  };
}

function publicKey(key: ApiKey): Omit<ApiKey, 'secretHash'> {
  return { keyId: key.keyId, scope: key.scope, revoked: key.revoked };
}

function parseLimit(value: unknown, fallback = 50): number {
  const n = Number.parseInt(String(value ?? ''), 10);
  if (Number.isNaN(n)) return fallback;
  return Math.min(Math.max(n, 1), 500);
}

// ── Factory ──

export function createAdminRoutes(deps: AdminDependencies): Router {
  const router = Router();
  const { logger } = deps;

  router.use('/admin', requireAdminSecret(deps.adminSecret));

  // ─── GET /admin/state: Orchestrator and policy overview ──
  router.get('/admin/state', (_req: Request, res: Response) => {
    const snapshot = deps.policy.getSnapshot();
    res.json({
      uptime: process.uptime(),
      orchestrator: deps.orchestrator.getState(),
      policy: { version: snapshot.version, agents: snapshot.agents.size, keys: snapshot.keys.size },
      audit: { totalEntries: deps.auditTrail.getCount() },
      scoring: deps.scoring.getStats(),
    });
  });

  // ─── GET /admin/agents: Registered agent endpoints ───────
  router.get('/admin/agents', (_req: Request, res: Response) => {
    const agents = deps.policy.listAgents();
    res.json({ agents, count: agents.length });
  });

  // ─── GET /admin/keys: Keys without their hashes ──────────
  router.get('/admin/keys', (_req: Request, res: Response) => {
    const keys = deps.policy.listKeys().map(publicKey);
    res.json({ keys, count: keys.length });
  });

  // ─── POST /admin/keys/:keyId/revoke ───────────────────────
  router.post('/admin/keys/:keyId/revoke', (req: Request, res: Response) => {
    try {
      const key = deps.policy.revokeKey(req.params.keyId);
      logger.info(`[Admin] API key revoked: ${key.keyId}`);
      res.json({ status: 'revoked', key: publicKey(key) });
    } catch (err) {
      if (err instanceof UnknownKeyError) {
        res.status(404).json({ error: err.message });
        return;
      }
      logger.error(`Admin revoke error: ${errorMessage(err)}`);
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  // ─── POST /admin/policy/reload ────────────────────────────
  router.post('/admin/policy/reload', (_req: Request, res: Response) => {
    try {
      deps.reloadPolicy();
      const snapshot = deps.policy.getSnapshot();
      logger.info(`[Admin] Policy reloaded (v${snapshot.version})`);
      res.json({ status: 'reloaded', version: snapshot.version });
    } catch (err) {
      if (err instanceof InvalidPolicyError) {
        res.status(400).json({ error: 'Invalid policy', issues: err.issues });
        return;
      }
      logger.error(`Admin policy reload error: ${errorMessage(err)}`);
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  // ─── GET /admin/audit/recent: Latest sealed turns ────────
  router.get('/admin/audit/recent', (req: Request, res: Response) => {
    const entries = deps.auditTrail.getRecent(parseLimit(req.query.limit));
    res.json({ entries, count: entries.length, total: deps.auditTrail.getCount() });
  });

  // ─── GET /admin/audit/verify: Hash chain check ───────────
  router.get('/admin/audit/verify', (_req: Request, res: Response) => {
    const result = deps.auditTrail.verifyChain();
    if (!result.valid) {
      logger.warn(`Audit chain broken at sequence ${result.brokenAt}`, { security: true });
    }
    res.json(result);
  });

  // ─── GET /admin/audit/:correlationId ──────────────────────
  router.get('/admin/audit/:correlationId', (req: Request, res: Response) => {
    const entry = deps.auditTrail.getByCorrelationId(req.params.correlationId);
    if (!entry) {
      res.status(404).json({ error: `No audit entry for ${req.params.correlationId}` });
      return;
    }
    res.json(entry);
  });

  // ─── GET /admin/scoring: Dispatcher queue stats ──────────
  router.get('/admin/scoring', (_req: Request, res: Response) => {
    res.json(deps.scoring.getStats());
  });

  return router;
}
