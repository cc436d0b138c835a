// ═══════════════════════════════════════════════════════════════
// Watchdog :: Client
// Compacts a sealed turn, asks the scoring model for a verdict,
// and always returns one. Failures become the `unavailable` verdict.
// ═══════════════════════════════════════════════════════════════

import type {
  LoggerHandle, RiskReason, ScoringModel, ScoringRequest, TurnRecord, WatchdogVerdict,
} from '../core/types.js';
import { RISK_REASONS, VerdictPayloadSchema } from '../core/types.js';
import { errorMessage } from '../core/errors.js';
import { compact } from '../core/text.js';
import { runWithTimeout } from '../core/timeout.js';

export interface WatchdogClientOptions {
  timeoutMs: number;
  summaryMaxChars: number;
  notesMaxChars?: number;
}

function isRiskReason(value: string): value is RiskReason {
  return RISK_REASONS.some(reason => reason === value);
}

export function unavailableVerdict(correlationId: string, notes: string): WatchdogVerdict {
  return {
    correlationId,
    riskLevel: 'unknown',
    reasons: [],
    notes,
    producedAt: new Date(),
    unavailable: true,
  };
}

export class WatchdogClient {
  private model: ScoringModel;
  private logger: LoggerHandle;
  private options: Required<WatchdogClientOptions>;

  constructor(model: ScoringModel, logger: LoggerHandle, options: WatchdogClientOptions) {
    this.model = model;
    this.logger = logger;
    this.options = { notesMaxChars: 500, ...options };
  }

  /** Bounded-size view of a turn; the only thing that leaves the process. */
  compactTurn(record: TurnRecord): ScoringRequest {
    const { summaryMaxChars } = this.options;
    const toolsUsed = [...new Set(record.toolCalls.map(call => call.request.toolName))];
    const anomalyCount = record.toolCalls.reduce(
      (count, call) => count + (call.result.ok ? call.result.anomalies.length : 0),
      0,
    );
    return {
      correlationId: record.correlationId,
      promptSummary: compact(record.promptSummary, summaryMaxChars),
      answerSummary: compact(record.finalAnswerSummary, summaryMaxChars),
      toolsUsed,
      anomalyCount,
    };
  }

  async score(record: TurnRecord): Promise<WatchdogVerdict> {
    const { correlationId } = record;
    const request = this.compactTurn(record);

    let raw: unknown;
    try {
      raw = await runWithTimeout('watchdog scoring', this.options.timeoutMs, signal =>
        this.model.score(request, signal)
      );
    } catch (err) {
      this.logger.error(`Watchdog unavailable for ${correlationId}: ${errorMessage(err)}`, { correlationId });
      return unavailableVerdict(correlationId, `scoring failed: ${errorMessage(err)}`);
    }

    const parsed = VerdictPayloadSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.error(`Watchdog returned a malformed verdict for ${correlationId}`, {
        correlationId,
        issues: parsed.error.issues.map(issue => issue.message),
      });
      return unavailableVerdict(correlationId, 'scoring failed: malformed verdict');
    }

    const reasons = [...new Set(parsed.data.reasons.filter(isRiskReason))];
    const verdict: WatchdogVerdict = {
      correlationId,
      riskLevel: parsed.data.riskLevel,
      reasons,
      notes: compact(parsed.data.notes, this.options.notesMaxChars),
      producedAt: new Date(),
      unavailable: false,
    };

    const message = `Watchdog verdict for ${correlationId}: ${verdict.riskLevel}`;
    if (verdict.riskLevel === 'high') {
      this.logger.warn(message, { correlationId, reasons, security: true });
    } else {
      this.logger.info(message, { correlationId, reasons });
    }
    return verdict;
  }
}
