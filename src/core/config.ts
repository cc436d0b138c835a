// ═══════════════════════════════════════════════════════════════
// Warden :: System Configuration
// ═══════════════════════════════════════════════════════════════

import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

function env(key: string, fallback?: string): string {
  const v = process.env[key];
  if (!v && fallback === undefined) throw new Error(`Missing env: ${key}`);
  return v || fallback || '';
}

function envInt(key: string, fallback: number): number {
  const parsed = parseInt(env(key, String(fallback)), 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function logLevel(value: string): LogLevel {
  return LOG_LEVELS.find(l => l === value) ?? 'info';
}

export const CONFIG = {
  // ── Worker Model (no network rights of its own) ──
  worker: {
    baseUrl: env('WORKER_BASE_URL', 'http://127.0.0.1:8080'),
    apiKey: env('WORKER_API_KEY', 'local'),
    model: env('WORKER_MODEL', 'worker'),
    maxTokens: envInt('WORKER_MAX_TOKENS', 4096),
    temperature: 0.3,
    timeoutMs: envInt('WORKER_TIMEOUT_MS', 60000),
    maxRetries: envInt('WORKER_MAX_RETRIES', 1),
  },

  // ── Watchdog (scoring) Model ──
  watchdog: {
    baseUrl: env('WATCHDOG_BASE_URL', 'http://127.0.0.1:8081'),
    apiKey: env('WATCHDOG_API_KEY', 'local'),
    model: env('WATCHDOG_MODEL', 'watchdog'),
    maxTokens: 512,
    timeoutMs: envInt('WATCHDOG_TIMEOUT_MS', 3000),
    summaryMaxChars: envInt('WATCHDOG_SUMMARY_MAX_CHARS', 400),
    concurrency: envInt('WATCHDOG_CONCURRENCY', 2),
    maxQueue: envInt('WATCHDOG_MAX_QUEUE', 200),
  },

  // ── Orchestrator ──
  orchestrator: {
    maxToolRoundTrips: envInt('MAX_TOOL_ROUND_TRIPS', 5),
    recordSummaryMaxChars: envInt('RECORD_SUMMARY_MAX_CHARS', 2000),
  },

  // ── Gateway ──
  gateway: {
    port: envInt('GATEWAY_PORT', 18790),
    host: env('GATEWAY_HOST', '127.0.0.1'),
    adminSecret: env('ADMIN_SECRET', ''),
  },

  // ── Policy ──
  policy: {
    path: env('POLICY_PATH', path.join(process.cwd(), 'config', 'policy.json')),
  },

  // ── Database ──
  database: {
    path: env('AUDIT_DB_PATH', path.join(process.cwd(), 'data', 'warden-audit.db')),
  },

  // ── Logging ──
  logging: {
    level: logLevel(env('LOG_LEVEL', 'info')),
    dir: env('LOG_DIR', path.join(process.cwd(), 'logs')),
  },

  // ── System Prompt ──
  systemPrompt: {
    path: env('SYSTEM_PROMPT_PATH', path.join(process.cwd(), 'config', 'system-prompt.md')),
  },
} as const;

export type Config = typeof CONFIG;
