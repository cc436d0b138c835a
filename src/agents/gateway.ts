// ═══════════════════════════════════════════════════════════════
// Agents :: Gateway
// The only code path that reaches an agent endpoint.
// Scope check → endpoint lookup → argument check → one POST →
// source re-validation → size cap.
// ═══════════════════════════════════════════════════════════════

import type {
  AgentEndpoint, AgentFailure, AgentResult, AgentSource, AgentSuccess,
  ApiKey, LoggerHandle, SourceAnomaly, ToolCallRequest,
} from '../core/types.js';
import { AgentResponseSchema } from '../core/types.js';
import { OversizedResponseError, PolicyError, TimeoutError, UnknownToolError, errorMessage } from '../core/errors.js';
import { runWithTimeout } from '../core/timeout.js';
import { byteLength, truncateBytes } from '../core/text.js';
import type { PolicyStore } from '../policy/policy-store.js';
import type { AgentHttpResponse, AgentTransport } from './transport.js';

// The raw body carries JSON framing and sources on top of the capped text.
const BODY_LIMIT_FACTOR = 4;
const BODY_LIMIT_SLACK_BYTES = 16 * 1024;

/** Largest raw response body read from an endpoint before it is abandoned. */
export function responseBodyLimit(endpoint: Pick<AgentEndpoint, 'maxResultBytes'>): number {
  return endpoint.maxResultBytes * BODY_LIMIT_FACTOR + BODY_LIMIT_SLACK_BYTES;
}

function failure(kind: AgentFailure['kind'], message: string): AgentFailure {
  return { ok: false, kind, message };
}

function isEmptyArgument(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim().length === 0;
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

export class AgentGateway {
  private policy: PolicyStore;
  private transport: AgentTransport;
  private logger: LoggerHandle;

  constructor(policy: PolicyStore, transport: AgentTransport, logger: LoggerHandle) {
    this.policy = policy;
    this.transport = transport;
    this.logger = logger;
  }

  /**
   * Throws PolicyError / UnknownToolError before any network activity.
   * Every other outcome, including timeouts, comes back as an AgentResult.
   */
  async invoke(request: ToolCallRequest, apiKey: ApiKey): Promise<AgentResult> {
    const { toolName, correlationId } = request;

    if (!this.policy.checkKeyScope(apiKey, toolName)) {
      this.logger.warn(`Tool call denied: key ${apiKey.keyId} not scoped for ${toolName}`, {
        security: true, correlationId, keyId: apiKey.keyId, toolName,
      });
      throw new PolicyError(`Key ${apiKey.keyId} is not authorized for ${toolName}`, apiKey.keyId, toolName);
    }

    const endpoint = this.policy.getAgent(toolName);
    if (!endpoint) {
      this.logger.error(`Tool call for unregistered agent: ${toolName}`, { correlationId });
      throw new UnknownToolError(toolName);
    }

    const missing = endpoint.requiredArguments.filter(arg => isEmptyArgument(request.arguments[arg]));
    if (missing.length > 0) {
      this.logger.info(`Tool call rejected locally: ${toolName} missing ${missing.join(', ')}`, { correlationId });
      return failure('invalid_arguments', `missing or empty argument(s): ${missing.join(', ')}`);
    }

    const start = Date.now();
    const response = await this.send(endpoint, request);
    if (!('status' in response)) return response;
    const { status, body } = response;

    if (status < 200 || status >= 300) {
      this.logger.warn(`Agent ${toolName} responded with HTTP ${status}`, { correlationId });
      return failure('transport', `agent responded with HTTP ${status}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch {
      this.logger.warn(`Agent ${toolName} returned a non-JSON body`, { correlationId });
      return failure('invalid_response', 'agent returned a non-JSON body');
    }
    const parsed = AgentResponseSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(`Agent ${toolName} returned a malformed result`, { correlationId });
      return failure('invalid_response', 'agent result did not match the expected shape');
    }

    const { sources, anomalies } = this.screenSources(endpoint, parsed.data.sources, correlationId);
    const result = this.capResult(endpoint, {
      ok: true,
      summary: parsed.data.summary,
      structuredSnippets: parsed.data.snippets,
      sources,
      partial: false,
      anomalies,
    });

    this.logger.info(`Agent ${toolName} answered in ${Date.now() - start}ms`, {
      correlationId, sources: result.sources.length, partial: result.partial, anomalies: anomalies.length,
    });
    return result;
  }

  private async send(endpoint: AgentEndpoint, request: ToolCallRequest): Promise<AgentHttpResponse | AgentFailure> {
    const { toolName, correlationId } = request;
    const start = Date.now();
    try {
      return await runWithTimeout(`agent ${toolName}`, endpoint.timeoutMs, signal =>
        this.transport.post(
          endpoint.invocationTarget,
          { toolName, arguments: request.arguments, correlationId },
          signal,
          responseBodyLimit(endpoint),
        )
      );
    } catch (err) {
      const latencyMs = Date.now() - start;
      if (err instanceof TimeoutError) {
        this.logger.warn(`Agent ${toolName} timed out after ${endpoint.timeoutMs}ms`, { correlationId, latencyMs });
        return failure('timeout', `agent timed out after ${endpoint.timeoutMs}ms`);
      }
      if (err instanceof OversizedResponseError) {
        this.logger.warn(`Agent ${toolName} response abandoned: ${err.message}`, { correlationId, latencyMs });
        return failure('invalid_response', `agent ${err.message}`);
      }
      this.logger.warn(`Agent ${toolName} transport failure: ${errorMessage(err)}`, { correlationId, latencyMs });
      return failure('transport', errorMessage(err));
    }
  }

  // ── Source Re-validation ──

  private screenSources(
    endpoint: AgentEndpoint,
    candidates: readonly AgentSource[],
    correlationId: string,
  ): { sources: AgentSource[]; anomalies: SourceAnomaly[] } {
    const sources: AgentSource[] = [];
    const anomalies: SourceAnomaly[] = [];
    for (const source of candidates) {
      if (this.policy.isDestinationAllowed(endpoint.name, source.url)) {
        sources.push({ url: source.url, title: source.title });
      } else {
        anomalies.push({ kind: 'disallowed_source', url: source.url });
        this.logger.warn(`Agent ${endpoint.name} returned a source outside its allowlist: ${source.url}`, {
          security: true, correlationId, agent: endpoint.name,
        });
      }
    }
    return { sources, anomalies };
  }

  // ── Size Cap ──

  private capResult(endpoint: AgentEndpoint, result: AgentSuccess): AgentSuccess {
    let remaining = endpoint.maxResultBytes;
    let partial = false;

    const take = (text: string): string => {
      const size = byteLength(text);
      if (size <= remaining) {
        remaining -= size;
        return text;
      }
      const cut = truncateBytes(text, remaining);
      remaining = 0;
      partial = true;
      return cut.text;
    };

    const summary = take(result.summary);

    const structuredSnippets: string[] = [];
    for (const snippet of result.structuredSnippets) {
      if (remaining === 0 && snippet.length > 0) {
        partial = true;
        break;
      }
      structuredSnippets.push(take(snippet));
    }

    // Sources are kept whole or dropped, never cut.
    const sources: AgentSource[] = [];
    for (const source of result.sources) {
      const size = byteLength(source.url) + byteLength(source.title);
      if (size > remaining) {
        partial = true;
        break;
      }
      remaining -= size;
      sources.push(source);
    }

    if (partial) {
      this.logger.info(`Agent ${endpoint.name} result truncated to ${endpoint.maxResultBytes} bytes`);
    }
    return { ...result, summary, structuredSnippets, sources, partial };
  }
}
