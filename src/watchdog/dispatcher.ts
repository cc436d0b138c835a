// ═══════════════════════════════════════════════════════════════
// Watchdog :: Scoring Dispatcher
// Runs scoring after the reply has gone out, on a bounded pool.
// Each submitted turn ends in exactly one persisted verdict.
// ═══════════════════════════════════════════════════════════════

import { EventEmitter } from 'eventemitter3';
import type { LoggerHandle, TurnRecord, WatchdogVerdict } from '../core/types.js';
import { DuplicateCorrelationError, errorMessage } from '../core/errors.js';
import { cloneTurnRecord } from '../protocols/turn-recorder.js';
import type { AuditEntry, AuditSink } from '../protocols/audit-trail.js';
import { unavailableVerdict, type WatchdogClient } from './client.js';

export interface ScoringDispatcherOptions {
  concurrency: number;
  maxQueue: number;
}

export interface ScoringStats {
  queued: number;
  active: number;
  submitted: number;
  scored: number;
  unavailable: number;
  saturated: number;
  persistFailures: number;
}

type DispatcherEvents = {
  'verdict:recorded': (entry: AuditEntry) => void;
  'verdict:lost': (correlationId: string, error: string) => void;
};

export class ScoringDispatcher extends EventEmitter<DispatcherEvents> {
  private watchdog: Pick<WatchdogClient, 'score'>;
  private sink: AuditSink;
  private logger: LoggerHandle;
  private options: ScoringDispatcherOptions;
  private queue: TurnRecord[] = [];
  private pending = new Set<string>();
  private active = 0;
  private idleWaiters: Array<() => void> = [];
  private stats = { submitted: 0, scored: 0, unavailable: 0, saturated: 0, persistFailures: 0 };

  constructor(
    watchdog: Pick<WatchdogClient, 'score'>,
    sink: AuditSink,
    logger: LoggerHandle,
    options: ScoringDispatcherOptions,
  ) {
    super();
    this.watchdog = watchdog;
    this.sink = sink;
    this.logger = logger;
    this.options = { concurrency: Math.max(1, options.concurrency), maxQueue: Math.max(0, options.maxQueue) };
  }

  /** Hand a sealed turn off for scoring. Returns immediately. */
  submit(record: TurnRecord): void {
    const { correlationId } = record;
    if (this.pending.has(correlationId)) {
      throw new DuplicateCorrelationError(correlationId);
    }
    this.stats.submitted++;
    const copy = cloneTurnRecord(record);

    if (this.queue.length >= this.options.maxQueue && this.active >= this.options.concurrency) {
      this.stats.saturated++;
      this.logger.warn(`Scoring queue saturated; recording ${correlationId} as unavailable`, {
        correlationId, queued: this.queue.length,
      });
      this.persist(copy, unavailableVerdict(correlationId, 'scoring skipped: queue saturated'));
      return;
    }

    this.pending.add(correlationId);
    this.queue.push(copy);
    this.pump();
  }

  /** Resolves once every submitted turn has a persisted verdict. */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  getStats(): ScoringStats {
    return { queued: this.queue.length, active: this.active, ...this.stats };
  }

  private pump(): void {
    while (this.active < this.options.concurrency) {
      const record = this.queue.shift();
      if (!record) break;
      this.active++;
      void this.run(record)
        .finally(() => {
          this.active--;
          this.pending.delete(record.correlationId);
          this.pump();
          if (this.isIdle()) this.notifyIdle();
        })
        .catch(err => {
          this.logger.error(`Scoring run for ${record.correlationId} failed: ${errorMessage(err)}`, {
            correlationId: record.correlationId,
          });
        });
    }
  }

  private async run(record: TurnRecord): Promise<void> {
    let verdict: WatchdogVerdict;
    try {
      verdict = await this.watchdog.score(record);
    } catch (err) {
      // WatchdogClient never throws; a substitute client still must not lose the turn.
      verdict = unavailableVerdict(record.correlationId, `scoring failed: ${errorMessage(err)}`);
    }
    this.persist(record, verdict);
  }

  private persist(record: TurnRecord, verdict: WatchdogVerdict): void {
    if (verdict.unavailable) this.stats.unavailable++;
    else this.stats.scored++;
    let entry: AuditEntry;
    try {
      entry = this.sink.append(record, verdict);
    } catch (err) {
      this.stats.persistFailures++;
      this.logger.error(`Audit write failed for ${record.correlationId}: ${errorMessage(err)}`, {
        correlationId: record.correlationId,
      });
      this.notify(record.correlationId, () => this.emit('verdict:lost', record.correlationId, errorMessage(err)));
      return;
    }
    this.notify(record.correlationId, () => this.emit('verdict:recorded', entry));
  }

  /** Listener failures are logged; the verdict is already persisted. */
  private notify(correlationId: string, emit: () => void): void {
    try {
      emit();
    } catch (err) {
      this.logger.error(`Scoring listener failed for ${correlationId}: ${errorMessage(err)}`, { correlationId });
    }
  }

  private isIdle(): boolean {
    return this.active === 0 && this.queue.length === 0;
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
