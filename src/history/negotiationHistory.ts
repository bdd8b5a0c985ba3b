import { appendFile } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';

import type { ErrorCode } from '../errors.js';
import type { NegotiationKind } from '../negotiation/types.js';

export type NegotiationOutcome = 'selected' | 'not_acceptable' | 'malformed_header' | 'invalid_availability' | 'error';

export interface HistoryEntry {
  id: string;
  timestamp: string;
  kind: NegotiationKind;
  header: string;
  available: string[];
  result: NegotiationOutcome;
  selected?: string;
  negotiatedQuality?: number;
  durationMs?: number;
  errorCode?: ErrorCode;
  message?: string;
}

export interface HistoryQuery {
  kind?: NegotiationKind;
  result?: NegotiationOutcome;
  since?: string;
  limit?: number;
}

export function outcomeForError(code: ErrorCode): NegotiationOutcome {
  switch (code) {
    case 'NOT_ACCEPTABLE':
      return 'not_acceptable';
    case 'MALFORMED_HEADER':
      return 'malformed_header';
    case 'INVALID_AVAILABILITY':
      return 'invalid_availability';
    default:
      return 'error';
  }
}

/** Bounded in-memory log of negotiation outcomes, optionally mirrored to a JSONL file. */
export class NegotiationHistory {
  private readonly entries: HistoryEntry[] = [];

  constructor(
    private readonly maxEntries: number,
    private readonly persistPath?: string,
    private readonly logger?: Logger
  ) {}

  async record(entry: Omit<HistoryEntry, 'id' | 'timestamp'>): Promise<HistoryEntry> {
    const created: HistoryEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry
    };

    this.entries.push(created);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }

    if (this.persistPath) {
      const line = `${JSON.stringify(created)}\n`;
      try {
        await appendFile(this.persistPath, line, 'utf8');
      } catch (error) {
        this.logger?.warn({ err: error, persistPath: this.persistPath }, 'Failed to persist negotiation history entry');
      }
    }

    return created;
  }

  query(query: HistoryQuery = {}): HistoryEntry[] {
    const sinceMs = query.since ? Date.parse(query.since) : Number.NaN;
    const limit = query.limit && Number.isFinite(query.limit) ? Math.max(1, query.limit) : 100;

    const filtered = this.entries.filter((entry) => {
      if (query.kind && entry.kind !== query.kind) {
        return false;
      }
      if (query.result && entry.result !== query.result) {
        return false;
      }
      if (Number.isFinite(sinceMs) && Date.parse(entry.timestamp) < sinceMs) {
        return false;
      }
      return true;
    });

    return filtered.slice(-limit).reverse();
  }

  get size(): number {
    return this.entries.length;
  }
}
