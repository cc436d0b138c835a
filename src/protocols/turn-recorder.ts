// ═══════════════════════════════════════════════════════════════
// Protocol :: Turn Recorder
// One record per turn, keyed by correlation id.
// Open while the turn runs, frozen once sealed, handed on by value.
// ═══════════════════════════════════════════════════════════════

import type {
  AgentResult, LoggerHandle, ToolCallEntry, ToolCallRequest, TurnOutcome, TurnRecord,
} from '../core/types.js';
import { AlreadySealedError, CorrelationMismatchError, DuplicateCorrelationError } from '../core/errors.js';
import { summarize } from '../core/text.js';

export interface TurnHandle {
  readonly correlationId: string;
}

interface DraftTurn {
  handle: TurnHandle;
  promptSummary: string;
  toolCalls: ToolCallEntry[];
  createdAt: Date;
  sealed: TurnRecord | null;
}

export interface SealOptions {
  outcome?: TurnOutcome;
  toolLoopExceeded?: boolean;
}

export interface TurnRecorderOptions {
  summaryMaxChars: number;
  /** How many sealed ids are remembered for collision detection. */
  recentIdCapacity?: number;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value) && !(value instanceof Date)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/** Copy for handing a sealed record to a consumer that may outlive the request. */
export function cloneTurnRecord(record: TurnRecord): TurnRecord {
  return deepFreeze(structuredClone(record));
}

export class TurnRecorder {
  private drafts = new WeakMap<TurnHandle, DraftTurn>();
  private open = new Set<string>();
  private recentlySealed = new Set<string>();
  private logger: LoggerHandle;
  private summaryMaxChars: number;
  private recentIdCapacity: number;

  constructor(logger: LoggerHandle, options: TurnRecorderOptions) {
    this.logger = logger;
    this.summaryMaxChars = options.summaryMaxChars;
    this.recentIdCapacity = options.recentIdCapacity ?? 10000;
  }

  begin(correlationId: string, prompt: string): TurnHandle {
    if (this.open.has(correlationId) || this.recentlySealed.has(correlationId)) {
      this.logger.error(`Correlation id collision: ${correlationId}`);
      throw new DuplicateCorrelationError(correlationId);
    }

    const handle: TurnHandle = Object.freeze({ correlationId });
    this.drafts.set(handle, {
      handle,
      promptSummary: summarize(prompt, this.summaryMaxChars),
      toolCalls: [],
      createdAt: new Date(),
      sealed: null,
    });
    this.open.add(correlationId);
    this.logger.debug(`Turn begun: ${correlationId}`);
    return handle;
  }

  recordToolCall(handle: TurnHandle, request: ToolCallRequest, result: AgentResult): void {
    const draft = this.draftFor(handle);
    if (draft.sealed) throw new AlreadySealedError(handle.correlationId);
    if (request.correlationId !== handle.correlationId) {
      throw new CorrelationMismatchError(handle.correlationId, request.correlationId);
    }

    draft.toolCalls.push(deepFreeze(structuredClone({ request, result })));

    if (result.ok) {
      this.logger.info(`Tool call recorded: ${request.toolName}`, {
        correlationId: handle.correlationId, partial: result.partial, anomalies: result.anomalies.length,
      });
    } else {
      this.logger.warn(`Tool call failed: ${request.toolName} (${result.kind}) ${result.message}`, {
        correlationId: handle.correlationId,
      });
    }
  }

  seal(handle: TurnHandle, finalAnswer: string, options: SealOptions = {}): TurnRecord {
    const draft = this.draftFor(handle);
    if (draft.sealed) throw new AlreadySealedError(handle.correlationId);

    const record: TurnRecord = deepFreeze({
      correlationId: handle.correlationId,
      promptSummary: draft.promptSummary,
      toolCalls: [...draft.toolCalls],
      finalAnswerSummary: summarize(finalAnswer, this.summaryMaxChars),
      outcome: options.outcome ?? 'answered',
      toolLoopExceeded: options.toolLoopExceeded ?? false,
      createdAt: draft.createdAt,
      sealedAt: new Date(),
    });
    draft.sealed = record;

    this.open.delete(handle.correlationId);
    this.rememberSealed(handle.correlationId);
    this.logger.info(`Turn sealed: ${handle.correlationId}`, {
      toolCalls: record.toolCalls.length, outcome: record.outcome, toolLoopExceeded: record.toolLoopExceeded,
    });
    return record;
  }

  isSealed(handle: TurnHandle): boolean {
    return this.draftFor(handle).sealed !== null;
  }

  getOpenCount(): number {
    return this.open.size;
  }

  private draftFor(handle: TurnHandle): DraftTurn {
    const draft = this.drafts.get(handle);
    // Handles are only minted by begin(); anything else is a caller bug.
    if (!draft) throw new Error(`Unknown turn handle: ${handle.correlationId}`);
    return draft;
  }

  private rememberSealed(correlationId: string): void {
    this.recentlySealed.add(correlationId);
    if (this.recentlySealed.size > this.recentIdCapacity) {
      const oldest = this.recentlySealed.values().next();
      if (!oldest.done) this.recentlySealed.delete(oldest.value);
    }
  }
}
