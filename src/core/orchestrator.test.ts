import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Orchestrator, describeToolResult, toolLoopNote } from './orchestrator.js';
import { CorrelationMismatchError, UpstreamError } from './errors.js';
import type { ApiKey, TurnRecord, TurnState, WatchdogVerdict } from './types.js';
import { AgentGateway } from '../agents/gateway.js';
import { PolicyStore } from '../policy/policy-store.js';
import { TurnRecorder } from '../protocols/turn-recorder.js';
import { AuditTrail } from '../protocols/audit-trail.js';
import { ScoringDispatcher } from '../watchdog/dispatcher.js';
import {
  FakeTransport, ScriptedWorker, answer, createMockLogger, createTestDb, hangingTransport,
  jsonResponse, testEndpoint, testKey, toolCall,
} from '../test-utils/mocks.js';

const RESEARCH_REPLY = {
  summary: 'Node 20 LTS',
  sources: [{ url: 'https://docs.example.org/node', title: 'Node' }],
};

describe('Orchestrator', () => {
  let policy: PolicyStore;
  let recorder: TurnRecorder;
  let submitted: TurnRecord[];
  let researchKey: ApiKey;
  let chatKey: ApiKey;
  let n: number;

  beforeEach(() => {
    policy = new PolicyStore(createMockLogger());
    policy.registerAgent(testEndpoint());
    policy.registerKey(testKey('research-secret', { keyId: 'key-research', scope: ['internet_research', 'ghost'] }));
    policy.registerKey(testKey('chat-secret', { keyId: 'key-chat', scope: [] }));
    const research = policy.resolveKey('research-secret');
    const chat = policy.resolveKey('chat-secret');
    if (!research || !chat) throw new Error('keys not resolved');
    researchKey = research;
    chatKey = chat;

    recorder = new TurnRecorder(createMockLogger(), { summaryMaxChars: 2000 });
    submitted = [];
    n = 0;
  });

  function build(worker: ScriptedWorker, transport: FakeTransport, maxToolRoundTrips = 5): Orchestrator {
    return new Orchestrator(
      {
        worker,
        gateway: new AgentGateway(policy, transport, createMockLogger()),
        recorder,
        scoring: { submit: record => { submitted.push(record); } },
        policy,
        logger: createMockLogger(),
      },
      {
        systemPrompt: 'You are a test assistant.',
        maxToolRoundTrips,
        newCorrelationId: () => `turn-${++n}`,
      },
    );
  }

  it('should answer a chat-only turn without any agent call', async () => {
    const worker = new ScriptedWorker([answer('pong')]);
    const transport = new FakeTransport(async () => jsonResponse(RESEARCH_REPLY));
    const orch = build(worker, transport);

    const reply = await orch.handleTurn({ prompt: 'ping', apiKey: chatKey });

    expect(reply).toEqual({ correlationId: 'turn-1', answer: 'pong', toolLoopExceeded: false, toolCalls: 0 });
    expect(transport.calls).toHaveLength(0);
    expect(worker.requests[0]).toEqual({
      correlationId: 'turn-1',
      systemPrompt: 'You are a test assistant.',
      conversationHistory: [{ role: 'user', content: 'ping' }],
      availableTools: [],
    });
    expect(submitted).toHaveLength(1);
    expect(submitted[0]).toMatchObject({ correlationId: 'turn-1', outcome: 'answered', finalAnswerSummary: 'pong' });
  });

  it('should run a tool round trip and feed the result back', async () => {
    const worker = new ScriptedWorker([
      toolCall('internet_research', { query: 'node lts' }),
      answer('Node 20 is LTS.'),
    ]);
    const transport = new FakeTransport(async () => jsonResponse(RESEARCH_REPLY));
    const orch = build(worker, transport);

    const reply = await orch.handleTurn({ prompt: 'which node is lts?', apiKey: researchKey });

    expect(reply.answer).toBe('Node 20 is LTS.');
    expect(reply.toolCalls).toBe(1);
    expect(transport.calls).toHaveLength(1);
    expect(worker.requests[0].availableTools.map(t => t.name)).toEqual(['internet_research']);
    expect(worker.requests[1].conversationHistory).toEqual([
      { role: 'user', content: 'which node is lts?' },
      { role: 'tool_call', callId: 'call-1', toolName: 'internet_research', arguments: { query: 'node lts' } },
      {
        role: 'tool_result',
        callId: 'call-1',
        content: 'Node 20 LTS\n\nSources:\n- Node <https://docs.example.org/node>',
        isError: false,
      },
    ]);
    expect(submitted[0].toolCalls[0].request).toEqual({
      toolName: 'internet_research', arguments: { query: 'node lts' }, correlationId: 'turn-1', callId: 'call-1',
    });
  });

  it('should walk the turn states in order', async () => {
    const worker = new ScriptedWorker([toolCall('internet_research', { query: 'q' }), answer('ok')]);
    const orch = build(worker, new FakeTransport(async () => jsonResponse(RESEARCH_REPLY)));
    const states: TurnState[] = [];
    orch.on('turn:state', (_id, state) => states.push(state));

    await orch.handleTurn({ prompt: 'q', apiKey: researchKey });

    expect(states).toEqual([
      'received', 'awaiting_worker', 'tool_requested', 'awaiting_agent', 'awaiting_worker', 'finalized', 'sealed',
    ]);
  });

  it('should deny an out-of-scope tool call and let the worker answer anyway', async () => {
    const worker = new ScriptedWorker([toolCall('internet_research', { query: 'q' }), answer('I cannot look that up.')]);
    const transport = new FakeTransport(async () => jsonResponse(RESEARCH_REPLY));
    const orch = build(worker, transport);
    const denied: string[] = [];
    orch.on('policy:denied', (_id, keyId, toolName) => denied.push(`${keyId}:${toolName}`));

    const reply = await orch.handleTurn({ prompt: 'look it up', apiKey: chatKey });

    expect(reply.answer).toBe('I cannot look that up.');
    expect(transport.calls).toHaveLength(0);
    expect(denied).toEqual(['key-chat:internet_research']);
    expect(worker.requests[1].conversationHistory[2]).toEqual({
      role: 'tool_result', callId: 'call-1', content: 'tool call failed: not authorized', isError: true,
    });
    expect(submitted[0].toolCalls[0].result).toEqual({ ok: false, kind: 'policy', message: 'not authorized' });
  });

  it('should feed back a call to an unregistered tool as a failure', async () => {
    const worker = new ScriptedWorker([toolCall('ghost', {}), answer('done')]);
    const orch = build(worker, new FakeTransport(async () => jsonResponse(RESEARCH_REPLY)));

    await orch.handleTurn({ prompt: 'q', apiKey: researchKey });

    expect(worker.requests[1].conversationHistory[2]).toMatchObject({ content: 'tool call failed: unknown tool: ghost' });
  });

  it('should feed back missing arguments without calling the agent', async () => {
    const worker = new ScriptedWorker([toolCall('internet_research', { query: '' }), answer('done')]);
    const transport = new FakeTransport(async () => jsonResponse(RESEARCH_REPLY));
    const orch = build(worker, transport);

    await orch.handleTurn({ prompt: 'q', apiKey: researchKey });

    expect(transport.calls).toHaveLength(0);
    expect(worker.requests[1].conversationHistory[2]).toMatchObject({
      content: 'tool call failed: missing or empty argument(s): query',
      isError: true,
    });
  });

  it('should stop after the round-trip bound and flag the answer', async () => {
    const worker = new ScriptedWorker([], toolCall('internet_research', { query: 'again' }));
    const transport = new FakeTransport(async () => jsonResponse(RESEARCH_REPLY));
    const orch = build(worker, transport, 5);

    const reply = await orch.handleTurn({ prompt: 'loop forever', apiKey: researchKey });

    expect(transport.calls).toHaveLength(5);
    expect(worker.requests).toHaveLength(6);
    expect(reply.toolLoopExceeded).toBe(true);
    expect(reply.answer).toBe(toolLoopNote(5));
    expect(reply.toolCalls).toBe(5);
    expect(submitted[0].toolLoopExceeded).toBe(true);
  });

  it('should keep the worker text next to the loop note', async () => {
    const worker = new ScriptedWorker([], {
      type: 'tool_call', callId: 'c', toolName: 'internet_research', arguments: { query: 'q' }, text: 'Still checking.',
    });
    const orch = build(worker, new FakeTransport(async () => jsonResponse(RESEARCH_REPLY)), 1);

    const reply = await orch.handleTurn({ prompt: 'q', apiKey: researchKey });
    expect(reply.answer).toBe(`Still checking.\n\n${toolLoopNote(1)}`);
  });

  it('should seal and submit the turn, then raise UpstreamError, when the worker fails', async () => {
    const worker = new ScriptedWorker([new Error('connection reset')]);
    const orch = build(worker, new FakeTransport(async () => jsonResponse(RESEARCH_REPLY)));

    const result = orch.handleTurn({ prompt: 'hello', apiKey: chatKey });
    await expect(result).rejects.toBeInstanceOf(UpstreamError);
    await expect(result).rejects.toMatchObject({ correlationId: 'turn-1' });

    expect(submitted).toHaveLength(1);
    expect(submitted[0].outcome).toBe('upstream_error');
    expect(submitted[0].finalAnswerSummary).toBe('upstream error: Worker model call failed: connection reset');
    expect(recorder.getOpenCount()).toBe(0);
    expect(orch.getState()).toEqual({ inFlight: 0, completed: 0, failed: 1, maxToolRoundTrips: 5 });
  });

  it('should let an integration error propagate unchanged and seal the turn as internal_error', async () => {
    const orch = new Orchestrator(
      {
        worker: new ScriptedWorker([toolCall('internet_research', { query: 'q' })]),
        gateway: {
          invoke: async () => {
            throw new CorrelationMismatchError('turn-1', 'turn-9');
          },
        },
        recorder,
        scoring: { submit: record => { submitted.push(record); } },
        policy,
        logger: createMockLogger(),
      },
      { systemPrompt: 'sys', maxToolRoundTrips: 5, newCorrelationId: () => 'turn-1' },
    );

    const result = orch.handleTurn({ prompt: 'q', apiKey: researchKey });
    await expect(result).rejects.toBeInstanceOf(CorrelationMismatchError);
    await expect(result).rejects.not.toBeInstanceOf(UpstreamError);

    expect(submitted).toHaveLength(1);
    expect(submitted[0].outcome).toBe('internal_error');
    expect(submitted[0].finalAnswerSummary).toBe('internal error: Tool call for turn-9 recorded against turn turn-1');
    expect(orch.getState()).toEqual({ inFlight: 0, completed: 0, failed: 1, maxToolRoundTrips: 5 });
  });

  it('should keep tool calls made before a worker failure in the record', async () => {
    const worker = new ScriptedWorker([toolCall('internet_research', { query: 'q' }), new Error('model crashed')]);
    const transport = new FakeTransport(async () => jsonResponse(RESEARCH_REPLY));
    const orch = build(worker, transport);

    await expect(orch.handleTurn({ prompt: 'q', apiKey: researchKey })).rejects.toThrow(UpstreamError);
    expect(submitted[0].toolCalls).toHaveLength(1);
  });

  describe('with fake timers', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should feed an agent timeout back to the worker', async () => {
      const worker = new ScriptedWorker([toolCall('internet_research', { query: 'slow' }), answer('The agent was too slow.')]);
      const transport = hangingTransport();
      const orch = build(worker, transport);

      const pending = orch.handleTurn({ prompt: 'q', apiKey: researchKey });
      await vi.advanceTimersByTimeAsync(8000);
      const reply = await pending;

      expect(reply.answer).toBe('The agent was too slow.');
      expect(transport.calls).toHaveLength(1);
      expect(worker.requests[1].conversationHistory[2]).toEqual({
        role: 'tool_result', callId: 'call-1', content: 'tool call failed: agent timed out after 8000ms', isError: true,
      });
    });
  });

  it('should return the answer before the verdict is written', async () => {
    const gates: Array<() => void> = [];
    const trail = new AuditTrail(createTestDb(), createMockLogger());
    const dispatcher = new ScoringDispatcher(
      {
        score: record => new Promise<WatchdogVerdict>(resolve => {
          gates.push(() => resolve({
            correlationId: record.correlationId, riskLevel: 'low', reasons: [], notes: '', producedAt: new Date(), unavailable: false,
          }));
        }),
      },
      trail,
      createMockLogger(),
      { concurrency: 1, maxQueue: 10 },
    );
    const orch = new Orchestrator(
      {
        worker: new ScriptedWorker([answer('pong')]),
        gateway: new AgentGateway(policy, new FakeTransport(async () => jsonResponse(RESEARCH_REPLY)), createMockLogger()),
        recorder,
        scoring: dispatcher,
        policy,
        logger: createMockLogger(),
      },
      { systemPrompt: 'sys', maxToolRoundTrips: 5, newCorrelationId: () => 'turn-x' },
    );

    const reply = await orch.handleTurn({ prompt: 'ping', apiKey: chatKey });
    expect(reply.answer).toBe('pong');
    expect(trail.getCount()).toBe(0);

    gates.forEach(release => release());
    await dispatcher.drain();
    expect(trail.getByCorrelationId('turn-x')?.riskLevel).toBe('low');
  });
});

describe('describeToolResult', () => {
  it('should list snippets and flag partial or screened results', () => {
    expect(describeToolResult({
      ok: true,
      summary: 'Summary',
      structuredSnippets: ['one'],
      sources: [{ url: 'https://docs.example.org/a', title: '' }],
      partial: true,
      anomalies: [{ kind: 'disallowed_source', url: 'https://evil.test/' }],
    })).toBe([
      'Summary',
      '',
      'Snippets:',
      '- one',
      '',
      'Sources:',
      '- https://docs.example.org/a <https://docs.example.org/a>',
      '',
      '[partial result: truncated to the agent size limit]',
      '',
      '[1 source(s) removed: outside the agent allowlist]',
    ].join('\n'));
  });

  it('should prefix failures', () => {
    expect(describeToolResult({ ok: false, kind: 'transport', message: 'agent responded with HTTP 500' }))
      .toBe('tool call failed: agent responded with HTTP 500');
  });
});
