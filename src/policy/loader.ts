// ═══════════════════════════════════════════════════════════════
// Policy :: Document Loader
// JSON policy file → validated agent endpoints and API keys
// ═══════════════════════════════════════════════════════════════

import fs from 'fs';
import { createHash } from 'crypto';
import { z } from 'zod';
import { InvalidPolicyError } from '../core/errors.js';
import type { AgentEndpoint, ApiKey } from '../core/types.js';

// setTimeout clamps larger delays to 1ms.
const MAX_TIMER_MS = 2_147_483_647;

const AgentEndpointSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]{0,63}$/, 'agent name must be snake_case'),
  description: z.string().optional().default(''),
  invocationTarget: z.string().url(),
  allowedDestinations: z.array(z.string().min(1)).optional().default([]),
  timeoutMs: z.number().int().positive().max(MAX_TIMER_MS, 'timeoutMs exceeds the timer range').optional().default(8000),
  maxResultBytes: z.number().int().positive().optional().default(65536),
  requiredArguments: z.array(z.string().min(1)).optional().default([]),
});

const ApiKeySchema = z.object({
  keyId: z.string().min(1),
  secretHash: z.string().regex(/^[0-9a-f]{64}$/, 'secretHash must be a sha256 hex digest'),
  scope: z.array(z.string()).optional().default([]),
  revoked: z.boolean().optional().default(false),
});

export const PolicyDocumentSchema = z.object({
  version: z.literal(1),
  agents: z.array(AgentEndpointSchema).optional().default([]),
  apiKeys: z.array(ApiKeySchema).optional().default([]),
});

export interface PolicyDocument {
  agents: AgentEndpoint[];
  apiKeys: ApiKey[];
}

export function parsePolicyDocument(raw: unknown): PolicyDocument {
  const parsed = PolicyDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidPolicyError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    );
  }
  return { agents: parsed.data.agents, apiKeys: parsed.data.apiKeys };
}

export function loadPolicyFile(policyPath: string): PolicyDocument {
  const text = fs.readFileSync(policyPath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new InvalidPolicyError([`${policyPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }
  return parsePolicyDocument(raw);
}

export function hashApiKeySecret(secret: string): string {
  return createHash('sha256').update(secret, 'utf8').digest('hex');
}
