#!/usr/bin/env node
// ═══════════════════════════════════════════════════════════════
//
//   WARDEN: Request-mediating orchestrator
//   A worker model with no network rights, allowlisted agents that
//   fetch on its behalf, and a watchdog that scores every turn.
//
// ═══════════════════════════════════════════════════════════════

import fs from 'fs';
import path from 'path';
import Anthropic from '@anthropic-ai/sdk';
import Database from 'better-sqlite3';
import { Orchestrator } from './core/orchestrator.js';
import { createLogger } from './core/logger.js';
import { CONFIG } from './core/config.js';
import { errorMessage } from './core/errors.js';
import { PolicyStore } from './policy/policy-store.js';
import { loadPolicyFile } from './policy/loader.js';
import { AgentGateway } from './agents/gateway.js';
import { HttpAgentTransport } from './agents/transport.js';
import { TurnRecorder } from './protocols/turn-recorder.js';
import { AuditTrail } from './protocols/audit-trail.js';
import { WatchdogClient } from './watchdog/client.js';
import { ScoringDispatcher } from './watchdog/dispatcher.js';
import { AnthropicWorkerModel } from './models/anthropic-worker.js';
import { AnthropicScoringModel } from './models/anthropic-scoring.js';
import { GatewayServer } from './gateway/server.js';
import { createAdminRoutes } from './gateway/admin-routes.js';

const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful assistant. You have no network access. When you need outside information, call one of the tools you are given.';

function readSystemPrompt(promptPath: string): string {
  if (!fs.existsSync(promptPath)) return DEFAULT_SYSTEM_PROMPT;
  return fs.readFileSync(promptPath, 'utf-8').trim() || DEFAULT_SYSTEM_PROMPT;
}

async function main(): Promise<void> {
  fs.mkdirSync(CONFIG.logging.dir, { recursive: true });
  fs.mkdirSync(path.dirname(CONFIG.database.path), { recursive: true });

  const logger = createLogger('warden');

  logger.info('═══════════════════════════════════════════════════');
  logger.info('  Warden: booting');
  logger.info('═══════════════════════════════════════════════════');
  logger.info(`  Worker:   ${CONFIG.worker.model} @ ${CONFIG.worker.baseUrl}`);
  logger.info(`  Watchdog: ${CONFIG.watchdog.model} @ ${CONFIG.watchdog.baseUrl}`);
  logger.info(`  Policy:   ${CONFIG.policy.path}`);
  logger.info(`  Audit DB: ${CONFIG.database.path}`);

  // ── Phase 1: Policy ──

  logger.info('[1/5] Loading policy...');
  const policy = PolicyStore.fromDocument(loadPolicyFile(CONFIG.policy.path), createLogger('policy'));
  const reloadPolicy = (): void => policy.reload(loadPolicyFile(CONFIG.policy.path));

  // ── Phase 2: Audit + Scoring ──

  logger.info('[2/5] Opening audit trail...');
  const db = new Database(CONFIG.database.path);
  db.pragma('journal_mode = WAL');
  const auditTrail = new AuditTrail(db, createLogger('audit'));
  const chain = auditTrail.verifyChain();
  if (!chain.valid) {
    logger.warn(`Audit chain broken at sequence ${chain.brokenAt}`, { security: true });
  }

  logger.info('[3/5] Connecting models...');
  const workerClient = new Anthropic({
    apiKey: CONFIG.worker.apiKey,
    baseURL: CONFIG.worker.baseUrl,
    timeout: CONFIG.worker.timeoutMs,
    maxRetries: CONFIG.worker.maxRetries,
  });
  // Deadline and failure handling for scoring live in WatchdogClient.
  const watchdogClient = new Anthropic({
    apiKey: CONFIG.watchdog.apiKey,
    baseURL: CONFIG.watchdog.baseUrl,
    maxRetries: 0,
  });

  const watchdog = new WatchdogClient(
    new AnthropicScoringModel(watchdogClient.messages, {
      model: CONFIG.watchdog.model,
      maxTokens: CONFIG.watchdog.maxTokens,
    }),
    createLogger('watchdog'),
    { timeoutMs: CONFIG.watchdog.timeoutMs, summaryMaxChars: CONFIG.watchdog.summaryMaxChars },
  );
  const scoring = new ScoringDispatcher(watchdog, auditTrail, createLogger('scoring'), {
    concurrency: CONFIG.watchdog.concurrency,
    maxQueue: CONFIG.watchdog.maxQueue,
  });

  // ── Phase 3: Orchestrator ──

  logger.info('[4/5] Initializing orchestrator...');
  const orchestrator = new Orchestrator(
    {
      worker: new AnthropicWorkerModel(workerClient.messages, {
        model: CONFIG.worker.model,
        maxTokens: CONFIG.worker.maxTokens,
        temperature: CONFIG.worker.temperature,
      }),
      gateway: new AgentGateway(policy, new HttpAgentTransport(), createLogger('agents')),
      recorder: new TurnRecorder(createLogger('recorder'), {
        summaryMaxChars: CONFIG.orchestrator.recordSummaryMaxChars,
      }),
      scoring,
      policy,
      logger,
    },
    {
      systemPrompt: readSystemPrompt(CONFIG.systemPrompt.path),
      maxToolRoundTrips: CONFIG.orchestrator.maxToolRoundTrips,
    },
  );

  // ── Phase 4: Gateway ──

  logger.info('[5/5] Starting gateway...');
  if (!CONFIG.gateway.adminSecret) {
    logger.warn('ADMIN_SECRET not set: admin API and observer feed are disabled');
  }
  const gateway = new GatewayServer(
    {
      orchestrator,
      policy,
      adminRoutes: createAdminRoutes({
        policy,
        auditTrail,
        scoring,
        orchestrator,
        reloadPolicy,
        adminSecret: CONFIG.gateway.adminSecret,
        logger: createLogger('admin'),
      }),
      logger: createLogger('gateway'),
    },
    { port: CONFIG.gateway.port, host: CONFIG.gateway.host, adminSecret: CONFIG.gateway.adminSecret },
  );

  // ── Wire observer feed ──

  orchestrator.on('turn:finalized', (summary) => gateway.broadcast('turn:finalized', { ...summary }));
  orchestrator.on('policy:denied', (correlationId, keyId, toolName) =>
    gateway.broadcast('policy:denied', { correlationId, keyId, toolName })
  );
  scoring.on('verdict:recorded', (entry) =>
    gateway.broadcast('verdict:recorded', {
      correlationId: entry.correlationId,
      riskLevel: entry.riskLevel,
      unavailable: entry.unavailable,
      sequenceNumber: entry.sequenceNumber,
    })
  );
  scoring.on('verdict:lost', (correlationId, error) =>
    gateway.broadcast('verdict:lost', { correlationId, error })
  );

  await gateway.start();

  logger.info('═══════════════════════════════════════════════════');
  logger.info(`  Warden online: ${policy.listAgents().length} agents, ${policy.listKeys().length} keys`);
  logger.info('═══════════════════════════════════════════════════');

  // ── Policy reload on SIGHUP ──

  process.on('SIGHUP', () => {
    try {
      reloadPolicy();
    } catch (err) {
      logger.error(`Policy reload failed, keeping current policy: ${errorMessage(err)}`);
    }
  });

  // ── Graceful Shutdown ──

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received: draining scoring queue...`);
    await gateway.stop();
    await scoring.drain();
    db.close();
    logger.info('Warden offline.');
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

// ── Execute ──
main().catch((err) => {
  console.error('FATAL: Warden failed to start:', err);
  process.exit(1);
});
