// ═══════════════════════════════════════════════════════════════
// Protocol :: Audit Trail
// Append-only SHA-256 hash chain of sealed turns and their verdicts.
// One row per correlation id; the UNIQUE constraint makes a second
// verdict for the same turn impossible.
// ═══════════════════════════════════════════════════════════════

import { createHash } from 'crypto';
import Database from 'better-sqlite3';
import { v4 as uuid } from 'uuid';
import type { LoggerHandle, TurnRecord, WatchdogVerdict } from '../core/types.js';

export interface AuditEntry {
  id: string;
  sequenceNumber: number;
  timestamp: Date;
  correlationId: string;
  riskLevel: WatchdogVerdict['riskLevel'];
  unavailable: boolean;
  record: unknown;
  verdict: unknown;
  previousHash: string;
  hash: string;
}

/** Where sealed turns and verdicts end up. */
export interface AuditSink {
  append(record: TurnRecord, verdict: WatchdogVerdict): AuditEntry;
}

interface AuditRow {
  id: string;
  sequence_number: number;
  timestamp: string;
  correlation_id: string;
  risk_level: WatchdogVerdict['riskLevel'];
  unavailable: number;
  record: string;
  verdict: string;
  previous_hash: string;
  hash: string;
}

const GENESIS_HASH = '0'.repeat(64);

function chainHash(previousHash: string, sequence: number, timestamp: string, correlationId: string, record: string, verdict: string): string {
  return createHash('sha256')
    .update(`${previousHash}|${sequence}|${timestamp}|${correlationId}|${record}|${verdict}`)
    .digest('hex');
}

export class AuditTrail implements AuditSink {
  private db: Database.Database;
  private logger: LoggerHandle;
  private sequenceCounter: number;
  private lastHash: string;

  constructor(db: Database.Database, logger: LoggerHandle) {
    this.db = db;
    this.logger = logger;
    this.initSchema();

    // Resume from last entry
    const last = this.db.prepare(
      'SELECT sequence_number, hash FROM audit_trail ORDER BY sequence_number DESC LIMIT 1'
    ).get() as { sequence_number: number; hash: string } | undefined;

    this.sequenceCounter = last ? last.sequence_number : 0;
    this.lastHash = last ? last.hash : GENESIS_HASH;

    this.logger.info(`AuditTrail initialized (${this.sequenceCounter} entries)`);
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS audit_trail (
        id TEXT PRIMARY KEY,
        sequence_number INTEGER UNIQUE NOT NULL,
        timestamp TEXT NOT NULL,
        correlation_id TEXT UNIQUE NOT NULL,
        risk_level TEXT NOT NULL,
        unavailable INTEGER NOT NULL,
        record TEXT NOT NULL,
        verdict TEXT NOT NULL,
        previous_hash TEXT NOT NULL,
        hash TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_audit_seq ON audit_trail(sequence_number);
      CREATE INDEX IF NOT EXISTS idx_audit_risk ON audit_trail(risk_level);
      CREATE INDEX IF NOT EXISTS idx_audit_timestamp ON audit_trail(timestamp);
    `);
  }

  /** Append a turn + verdict pair. Throws if the correlation id was already recorded. */
  append(record: TurnRecord, verdict: WatchdogVerdict): AuditEntry {
    const sequence = this.sequenceCounter + 1;
    const id = uuid();
    const now = new Date();
    const timestamp = now.toISOString();
    const recordJson = JSON.stringify(record);
    const verdictJson = JSON.stringify(verdict);
    const hash = chainHash(this.lastHash, sequence, timestamp, record.correlationId, recordJson, verdictJson);

    this.db.prepare(`
      INSERT INTO audit_trail (id, sequence_number, timestamp, correlation_id, risk_level, unavailable, record, verdict, previous_hash, hash)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(id, sequence, timestamp, record.correlationId, verdict.riskLevel, verdict.unavailable ? 1 : 0, recordJson, verdictJson, this.lastHash, hash);

    const entry: AuditEntry = {
      id,
      sequenceNumber: sequence,
      timestamp: now,
      correlationId: record.correlationId,
      riskLevel: verdict.riskLevel,
      unavailable: verdict.unavailable,
      record: JSON.parse(recordJson),
      verdict: JSON.parse(verdictJson),
      previousHash: this.lastHash,
      hash,
    };

    this.sequenceCounter = sequence;
    this.lastHash = hash;
    return entry;
  }

  /** Verify the integrity of the entire hash chain */
  verifyChain(): { valid: boolean; brokenAt?: number; totalEntries: number } {
    const rows = this.db.prepare(
      'SELECT * FROM audit_trail ORDER BY sequence_number ASC'
    ).all() as AuditRow[];

    if (rows.length === 0) return { valid: true, totalEntries: 0 };

    let previousHash = GENESIS_HASH;

    for (const row of rows) {
      if (row.previous_hash !== previousHash) {
        this.logger.error(`Audit chain broken at sequence ${row.sequence_number}: previous_hash mismatch`);
        return { valid: false, brokenAt: row.sequence_number, totalEntries: rows.length };
      }

      const expectedHash = chainHash(row.previous_hash, row.sequence_number, row.timestamp, row.correlation_id, row.record, row.verdict);
      if (row.hash !== expectedHash) {
        this.logger.error(`Audit chain broken at sequence ${row.sequence_number}: hash mismatch`);
        return { valid: false, brokenAt: row.sequence_number, totalEntries: rows.length };
      }

      previousHash = row.hash;
    }

    return { valid: true, totalEntries: rows.length };
  }

  getByCorrelationId(correlationId: string): AuditEntry | null {
    const row = this.db.prepare(
      'SELECT * FROM audit_trail WHERE correlation_id = ?'
    ).get(correlationId) as AuditRow | undefined;
    return row ? this.rowToEntry(row) : null;
  }

  /** Get the latest N entries, oldest first */
  getRecent(limit = 50): AuditEntry[] {
    const rows = this.db.prepare(
      'SELECT * FROM audit_trail ORDER BY sequence_number DESC LIMIT ?'
    ).all(limit) as AuditRow[];

    return rows.map(r => this.rowToEntry(r)).reverse();
  }

  getCount(): number {
    return (this.db.prepare('SELECT COUNT(*) as c FROM audit_trail').get() as { c: number }).c;
  }

  private rowToEntry(row: AuditRow): AuditEntry {
    return {
      id: row.id,
      sequenceNumber: row.sequence_number,
      timestamp: new Date(row.timestamp),
      correlationId: row.correlation_id,
      riskLevel: row.risk_level,
      unavailable: row.unavailable === 1,
      record: JSON.parse(row.record),
      verdict: JSON.parse(row.verdict),
      previousHash: row.previous_hash,
      hash: row.hash,
    };
  }
}
