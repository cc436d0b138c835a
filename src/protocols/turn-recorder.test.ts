import { describe, it, expect, beforeEach } from 'vitest';
import { TurnRecorder, cloneTurnRecord } from './turn-recorder.js';
import { AlreadySealedError, CorrelationMismatchError, DuplicateCorrelationError } from '../core/errors.js';
import type { AgentResult, ToolCallRequest } from '../core/types.js';
import { createMockLogger } from '../test-utils/mocks.js';

const OK: AgentResult = {
  ok: true,
  summary: 'Node 20 is in maintenance',
  structuredSnippets: [],
  sources: [{ url: 'https://docs.example.org/node', title: 'Node' }],
  partial: false,
  anomalies: [],
};

function call(correlationId: string, callId = 'call-1'): ToolCallRequest {
  return { toolName: 'internet_research', arguments: { query: 'node' }, correlationId, callId };
}

describe('TurnRecorder', () => {
  let recorder: TurnRecorder;

  beforeEach(() => {
    recorder = new TurnRecorder(createMockLogger(), { summaryMaxChars: 2000 });
  });

  it('should seal a turn with its tool calls in order', () => {
    const handle = recorder.begin('turn-1', 'What is the node schedule?');
    recorder.recordToolCall(handle, call('turn-1', 'call-1'), OK);
    recorder.recordToolCall(handle, call('turn-1', 'call-2'), { ok: false, kind: 'timeout', message: 'agent timed out after 8000ms' });
    const record = recorder.seal(handle, 'Node 20 is in maintenance.');

    expect(record.correlationId).toBe('turn-1');
    expect(record.promptSummary).toBe('What is the node schedule?');
    expect(record.finalAnswerSummary).toBe('Node 20 is in maintenance.');
    expect(record.toolCalls.map(c => c.request.callId)).toEqual(['call-1', 'call-2']);
    expect(record.outcome).toBe('answered');
    expect(record.toolLoopExceeded).toBe(false);
    expect(record.sealedAt.getTime()).toBeGreaterThanOrEqual(record.createdAt.getTime());
  });

  it('should carry seal options into the record', () => {
    const handle = recorder.begin('turn-1', 'hello');
    const record = recorder.seal(handle, 'partial', { outcome: 'upstream_error', toolLoopExceeded: true });
    expect(record.outcome).toBe('upstream_error');
    expect(record.toolLoopExceeded).toBe(true);
  });

  it('should freeze the sealed record all the way down', () => {
    const handle = recorder.begin('turn-1', 'hello');
    recorder.recordToolCall(handle, call('turn-1'), OK);
    const record = recorder.seal(handle, 'done');

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.toolCalls)).toBe(true);
    expect(Object.isFrozen(record.toolCalls[0].request.arguments)).toBe(true);
  });

  it('should copy tool call data so later caller mutation has no effect', () => {
    const handle = recorder.begin('turn-1', 'hello');
    const args: Record<string, unknown> = { query: 'original' };
    recorder.recordToolCall(handle, { ...call('turn-1'), arguments: args }, OK);
    args.query = 'changed';

    const record = recorder.seal(handle, 'done');
    expect(record.toolCalls[0].request.arguments).toEqual({ query: 'original' });
  });

  it('should reject every mutation after sealing', () => {
    const handle = recorder.begin('turn-1', 'hello');
    recorder.seal(handle, 'done');

    expect(recorder.isSealed(handle)).toBe(true);
    expect(() => recorder.recordToolCall(handle, call('turn-1'), OK)).toThrow(AlreadySealedError);
    expect(() => recorder.seal(handle, 'again')).toThrow('Turn turn-1 is already sealed');
  });

  it('should reject a tool call for a different turn', () => {
    const handle = recorder.begin('turn-1', 'hello');
    expect(() => recorder.recordToolCall(handle, call('turn-2'), OK)).toThrow(CorrelationMismatchError);
  });

  it('should reject a reused correlation id, open or sealed', () => {
    const handle = recorder.begin('turn-1', 'hello');
    expect(() => recorder.begin('turn-1', 'again')).toThrow(DuplicateCorrelationError);
    recorder.seal(handle, 'done');
    expect(() => recorder.begin('turn-1', 'again')).toThrow(DuplicateCorrelationError);
  });

  it('should track open turns', () => {
    const a = recorder.begin('turn-a', 'a');
    recorder.begin('turn-b', 'b');
    expect(recorder.getOpenCount()).toBe(2);
    recorder.seal(a, 'done');
    expect(recorder.getOpenCount()).toBe(1);
  });

  it('should redact and compact summaries', () => {
    const small = new TurnRecorder(createMockLogger(), { summaryMaxChars: 10 });
    const handle = small.begin('turn-1', 'use  Bearer abc.def\n please');
    const record = small.seal(handle, 'a reply that is far too long');

    // "Bearer abc.def" (14 chars) masks to "Bear***.def"
    expect(record.promptSummary).toBe('use Bear*…');
    expect(record.finalAnswerSummary).toBe('a reply t…');
  });

  it('should forget the oldest sealed ids past capacity', () => {
    const small = new TurnRecorder(createMockLogger(), { summaryMaxChars: 100, recentIdCapacity: 1 });
    small.seal(small.begin('turn-1', 'a'), 'done');
    small.seal(small.begin('turn-2', 'b'), 'done');
    expect(() => small.begin('turn-1', 'c')).not.toThrow();
    expect(() => small.begin('turn-2', 'c')).toThrow(DuplicateCorrelationError);
  });

  it('should clone a sealed record into an independent frozen copy', () => {
    const record = recorder.seal(recorder.begin('turn-1', 'hello'), 'done');
    const copy = cloneTurnRecord(record);
    expect(copy).toEqual(record);
    expect(copy).not.toBe(record);
    expect(Object.isFrozen(copy)).toBe(true);
    expect(copy.createdAt).toBeInstanceOf(Date);
  });
});
