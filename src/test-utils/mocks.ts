import { vi } from 'vitest';
import Database from 'better-sqlite3';
import type Anthropic from '@anthropic-ai/sdk';
import type {
  AgentEndpoint, ApiKey, LoggerHandle, WorkerModel, WorkerRequest, WorkerResponse,
} from '../core/types.js';
import type { AgentCallPayload, AgentHttpResponse, AgentTransport } from '../agents/transport.js';
import { hashApiKeySecret } from '../policy/loader.js';
import type { MessagesApi } from '../models/anthropic-worker.js';

export function createMockLogger(): LoggerHandle {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function createTestDb(): Database.Database {
  return new Database(':memory:');
}

export function testEndpoint(overrides: Partial<AgentEndpoint> = {}): AgentEndpoint {
  return {
    name: 'internet_research',
    description: 'Searches the public web and summarizes what it finds',
    invocationTarget: 'http://agents.test/research',
    allowedDestinations: ['https://docs.example.org/'],
    timeoutMs: 8000,
    maxResultBytes: 65536,
    requiredArguments: ['query'],
    ...overrides,
  };
}

export function testKey(secret: string, overrides: Partial<ApiKey> = {}): ApiKey {
  return {
    keyId: 'key-test',
    secretHash: hashApiKeySecret(secret),
    scope: [],
    revoked: false,
    ...overrides,
  };
}

type ScriptStep = WorkerResponse | Error;

/** Replays a fixed list of worker responses; an Error step is thrown. */
export class ScriptedWorker implements WorkerModel {
  readonly requests: WorkerRequest[] = [];
  private steps: ScriptStep[];
  private fallback?: ScriptStep;

  constructor(steps: ScriptStep[], fallback?: ScriptStep) {
    this.steps = [...steps];
    this.fallback = fallback;
  }

  async complete(request: WorkerRequest): Promise<WorkerResponse> {
    this.requests.push(structuredClone(request));
    const step = this.steps.shift() ?? this.fallback;
    if (!step) throw new Error('scripted worker ran out of responses');
    if (step instanceof Error) throw step;
    return step;
  }
}

export function toolCall(toolName: string, args: Record<string, unknown>, callId = 'call-1'): WorkerResponse {
  return { type: 'tool_call', callId, toolName, arguments: args };
}

export function answer(text: string): WorkerResponse {
  return { type: 'answer', text };
}

type TransportHandler = (
  url: string, payload: AgentCallPayload, signal: AbortSignal, maxBodyBytes: number,
) => Promise<AgentHttpResponse>;

export class FakeTransport implements AgentTransport {
  readonly calls: Array<{ url: string; payload: AgentCallPayload; maxBodyBytes: number }> = [];
  private handler: TransportHandler;

  constructor(handler: TransportHandler) {
    this.handler = handler;
  }

  async post(url: string, payload: AgentCallPayload, signal: AbortSignal, maxBodyBytes: number): Promise<AgentHttpResponse> {
    this.calls.push({ url, payload, maxBodyBytes });
    return this.handler(url, payload, signal, maxBodyBytes);
  }
}

export function jsonResponse(body: unknown, status = 200): AgentHttpResponse {
  return { status, body: JSON.stringify(body) };
}

/** A transport that only settles when its signal aborts. */
export function hangingTransport(): FakeTransport {
  return new FakeTransport((_url, _payload, signal) =>
    new Promise((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    })
  );
}

// ── Messages API doubles ──

export function message(content: Anthropic.ContentBlock[]): Anthropic.Message {
  return {
    id: 'msg_test',
    type: 'message',
    role: 'assistant',
    model: 'test-model',
    content,
    stop_reason: 'end_turn',
    stop_sequence: null,
    usage: { input_tokens: 1, output_tokens: 1, cache_creation_input_tokens: null, cache_read_input_tokens: null },
  };
}

export function text(value: string): Anthropic.TextBlock {
  return { type: 'text', text: value, citations: null };
}

export class FakeMessages implements MessagesApi {
  readonly bodies: Anthropic.MessageCreateParamsNonStreaming[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];
  constructor(private reply: Anthropic.Message) {}

  async create(body: Anthropic.MessageCreateParamsNonStreaming, options?: { signal?: AbortSignal }): Promise<Anthropic.Message> {
    this.bodies.push(body);
    this.signals.push(options?.signal);
    return this.reply;
  }
}
