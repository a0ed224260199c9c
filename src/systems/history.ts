import type { HistoryEntry, NewHistoryEntry } from '../models.js';
import { KEYS } from '../persistence/records.js';
import { HistoryEntrySchema } from '../persistence/schemas.js';
import type { RecordStore } from '../persistence/store.js';
import { MalformedRecordError } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';

/**
 * Raw ledger contents. Entries are kept as stored, including ones written by
 * older tools, so appending never rewrites them. An unreadable ledger is
 * treated as empty.
 */
function loadLedger(store: RecordStore): unknown[] {
  let document: unknown;
  try {
    document = store.get(KEYS.history);
  } catch (err) {
    if (!(err instanceof MalformedRecordError)) throw err;
    logger.warn('History ledger unreadable, starting fresh', { key: KEYS.history, reason: err.context?.reason });
    return [];
  }
  if (document === undefined) return [];
  if (!Array.isArray(document)) {
    logger.warn('History ledger is not a list, starting fresh', { key: KEYS.history });
    return [];
  }
  return document;
}

function indexOf(entry: unknown): number {
  if (typeof entry === 'object' && entry !== null && 'history_index' in entry) {
    const index = entry.history_index;
    if (typeof index === 'number' && Number.isFinite(index)) return index;
  }
  return 0;
}

export function nextHistoryIndex(entries: readonly unknown[]): number {
  return entries.reduce<number>((max, entry) => Math.max(max, indexOf(entry)), 0) + 1;
}

/** Well-formed entries in append order. */
export function readHistory(store: RecordStore): HistoryEntry[] {
  const entries: HistoryEntry[] = [];
  for (const raw of loadLedger(store)) {
    const parsed = HistoryEntrySchema.safeParse(raw);
    if (parsed.success) entries.push(parsed.data);
  }
  return entries;
}

// Index space is shared by every persona and event type.
export function appendHistory(store: RecordStore, entry: NewHistoryEntry): HistoryEntry {
  const ledger = loadLedger(store);
  const recorded: HistoryEntry = { history_index: nextHistoryIndex(ledger), ...entry };
  ledger.push(recorded);
  store.put(KEYS.history, ledger);
  logger.debug('History recorded', { index: recorded.history_index, persona: entry.persona, event: entry.event });
  return recorded;
}

export function historyFor(store: RecordStore, persona: HistoryEntry['persona']): HistoryEntry[] {
  return readHistory(store).filter((entry) => entry.persona === persona);
}
