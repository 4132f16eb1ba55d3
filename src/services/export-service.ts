import type { EventStore } from './event-store.js';
import { encodeIncident, encodeTraceEvent, type EncodedRecord } from '../models/codec.js';

// ── Types ─────────────────────────────────────────────────────────────────

export const EXPORT_FORMATS = ['json', 'jsonl'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const EXPORT_KINDS = ['events', 'incidents'] as const;
export type ExportKind = (typeof EXPORT_KINDS)[number];

export interface ExportFilter {
  agent_id?: string;
  /** Minimum timestamp, epoch milliseconds. */
  since?: number;
  limit?: number;
}

const EXPORT_LIMIT = 10_000;

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((f) => f === value);
}

export function isExportKind(value: string): value is ExportKind {
  return EXPORT_KINDS.some((k) => k === value);
}

// ── Export ────────────────────────────────────────────────────────────────

/** Encoded records of one kind: events oldest first, incidents newest first. */
export function collectRecords(store: EventStore, kind: ExportKind, filter: ExportFilter = {}): EncodedRecord[] {
  const query = { agent_id: filter.agent_id, since: filter.since, limit: filter.limit ?? EXPORT_LIMIT };
  if (kind === 'incidents') {
    return store.incidents(query).map(encodeIncident);
  }
  return store.events(query).reverse().map(encodeTraceEvent);
}

/**
 * Serialize events or incidents. JSONL output has one record per line and
 * can be fed straight back to `driftwatch ingest`.
 */
export function exportRecords(
  store: EventStore,
  kind: ExportKind,
  format: ExportFormat,
  filter: ExportFilter = {},
): string {
  const records = collectRecords(store, kind, filter);

  if (format === 'jsonl') {
    return records.map((r) => JSON.stringify(r)).join('\n') + '\n';
  }
  return JSON.stringify(records, null, 2) + '\n';
}
