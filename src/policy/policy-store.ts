// ═══════════════════════════════════════════════════════════════
// Policy :: Store
// Agent allowlists and API-key scopes held as an immutable snapshot.
// Every change builds a new snapshot and swaps it in one assignment,
// so readers never see a half-applied update.
// ═══════════════════════════════════════════════════════════════

import { timingSafeEqual } from 'crypto';
import type { AgentEndpoint, ApiKey, LoggerHandle, ToolDescriptor } from '../core/types.js';
import { DuplicateNameError, UnknownAgentError, UnknownKeyError } from '../core/errors.js';
import { hashApiKeySecret, type PolicyDocument } from './loader.js';

export interface PolicySnapshot {
  readonly version: number;
  readonly agents: ReadonlyMap<string, AgentEndpoint>;
  readonly keys: ReadonlyMap<string, ApiKey>;
}

function freezeEndpoint(endpoint: AgentEndpoint): AgentEndpoint {
  return Object.freeze({
    ...endpoint,
    allowedDestinations: Object.freeze([...endpoint.allowedDestinations]),
    requiredArguments: Object.freeze([...endpoint.requiredArguments]),
  });
}

function freezeKey(key: ApiKey): ApiKey {
  return Object.freeze({ ...key, scope: Object.freeze([...key.scope]) });
}

export class PolicyStore {
  private snapshot: PolicySnapshot;
  private logger: LoggerHandle;

  constructor(logger: LoggerHandle) {
    this.logger = logger;
    this.snapshot = { version: 0, agents: new Map(), keys: new Map() };
  }

  static fromDocument(document: PolicyDocument, logger: LoggerHandle): PolicyStore {
    const store = new PolicyStore(logger);
    store.reload(document);
    return store;
  }

  // ── Agents ──

  registerAgent(endpoint: AgentEndpoint): void {
    const current = this.snapshot;
    if (current.agents.has(endpoint.name)) {
      throw new DuplicateNameError('agent', endpoint.name);
    }
    const agents = new Map(current.agents);
    agents.set(endpoint.name, freezeEndpoint(endpoint));
    this.swap({ agents, keys: current.keys });
    this.logger.info(`Agent registered: ${endpoint.name} -> ${endpoint.invocationTarget}`, {
      allowedDestinations: endpoint.allowedDestinations.length,
    });
  }

  getAgent(name: string): AgentEndpoint | undefined {
    return this.snapshot.agents.get(name);
  }

  listAgents(): AgentEndpoint[] {
    return Array.from(this.snapshot.agents.values());
  }

  /** Prefix match only; no DNS, no network. */
  isDestinationAllowed(agentName: string, url: string): boolean {
    const endpoint = this.snapshot.agents.get(agentName);
    if (!endpoint) throw new UnknownAgentError(agentName);
    return endpoint.allowedDestinations.some(prefix => url.startsWith(prefix));
  }

  // ── API Keys ──

  registerKey(key: ApiKey): void {
    const current = this.snapshot;
    if (current.keys.has(key.keyId)) {
      throw new DuplicateNameError('api key', key.keyId);
    }
    const keys = new Map(current.keys);
    keys.set(key.keyId, freezeKey(key));
    this.swap({ agents: current.agents, keys });
  }

  /** Look a key up by its plaintext secret. Unknown secrets resolve to undefined. */
  resolveKey(secret: string): ApiKey | undefined {
    const digest = Buffer.from(hashApiKeySecret(secret), 'hex');
    for (const key of this.snapshot.keys.values()) {
      const candidate = Buffer.from(key.secretHash, 'hex');
      if (candidate.length === digest.length && timingSafeEqual(candidate, digest)) {
        return key;
      }
    }
    return undefined;
  }

  /**
   * The single authorization check for tool dispatch. Reads the key's
   * current state, so a revocation after resolveKey() still applies.
   */
  checkKeyScope(apiKey: ApiKey, toolName: string): boolean {
    const current = this.snapshot.keys.get(apiKey.keyId);
    if (!current || current.revoked) return false;
    return current.scope.includes(toolName);
  }

  isKeyActive(apiKey: ApiKey): boolean {
    const current = this.snapshot.keys.get(apiKey.keyId);
    return current !== undefined && !current.revoked;
  }

  revokeKey(keyId: string): ApiKey {
    const current = this.snapshot;
    const existing = current.keys.get(keyId);
    if (!existing) throw new UnknownKeyError(keyId);
    const revoked = freezeKey({ ...existing, revoked: true });
    const keys = new Map(current.keys);
    keys.set(keyId, revoked);
    this.swap({ agents: current.agents, keys });
    this.logger.warn(`API key revoked: ${keyId}`, { security: true, keyId });
    return revoked;
  }

  listKeys(): ApiKey[] {
    return Array.from(this.snapshot.keys.values());
  }

  /** Registered agents inside the key's scope, as offered to the worker model. */
  toolsForKey(apiKey: ApiKey): ToolDescriptor[] {
    return this.listAgents()
      .filter(agent => this.checkKeyScope(apiKey, agent.name))
      .map(agent => ({
        name: agent.name,
        description: agent.description,
        requiredArguments: agent.requiredArguments,
      }));
  }

  // ── Reload ──

  /**
   * Replace the whole policy. Keys never disappear: a key missing from the
   * new document, or revoked in the old one, stays present and revoked.
   */
  reload(document: PolicyDocument): void {
    const agents = new Map<string, AgentEndpoint>();
    for (const endpoint of document.agents) {
      if (agents.has(endpoint.name)) throw new DuplicateNameError('agent', endpoint.name);
      agents.set(endpoint.name, freezeEndpoint(endpoint));
    }

    const previous = this.snapshot.keys;
    const keys = new Map<string, ApiKey>();
    for (const key of document.apiKeys) {
      if (keys.has(key.keyId)) throw new DuplicateNameError('api key', key.keyId);
      const wasRevoked = previous.get(key.keyId)?.revoked ?? false;
      keys.set(key.keyId, freezeKey({ ...key, revoked: key.revoked || wasRevoked }));
    }
    for (const [keyId, key] of previous) {
      if (!keys.has(keyId)) keys.set(keyId, freezeKey({ ...key, revoked: true }));
    }

    this.swap({ agents, keys });
    this.logger.info(`Policy loaded: ${agents.size} agents, ${keys.size} keys (v${this.snapshot.version})`);
  }

  getSnapshot(): PolicySnapshot {
    return this.snapshot;
  }

  private swap(next: { agents: ReadonlyMap<string, AgentEndpoint>; keys: ReadonlyMap<string, ApiKey> }): void {
    this.snapshot = Object.freeze({ version: this.snapshot.version + 1, agents: next.agents, keys: next.keys });
  }
}
