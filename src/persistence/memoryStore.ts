import type { RecordStore } from './store.js';
import { joinKey } from './store.js';
import { MalformedRecordError } from '../utils/errorhandler.js';

// Held as JSON text; every get returns a fresh copy.
export class MemoryRecordStore implements RecordStore {
  private readonly documents = new Map<string, string>();

  constructor(seed: Record<string, unknown> = {}) {
    for (const [key, document] of Object.entries(seed)) {
      this.put(key, document);
    }
  }

  get(key: string): unknown | undefined {
    const raw = this.documents.get(key);
    if (raw === undefined) return undefined;
    try {
      const document: unknown = JSON.parse(raw);
      return document;
    } catch (err) {
      throw new MalformedRecordError(key, err instanceof Error ? err.message : String(err));
    }
  }

  put(key: string, document: unknown) {
    this.documents.set(key, JSON.stringify(document));
  }

  /** Stores text verbatim; used to simulate a hand-edited, unparsable file. */
  putRaw(key: string, raw: string) {
    this.documents.set(key, raw);
  }

  list(prefix: string): string[] {
    const folder = `${joinKey(prefix)}/`;
    return [...this.documents.keys()]
      .filter((key) => key.startsWith(folder) && !key.slice(folder.length).includes('/'))
      .sort();
  }

  remove(key: string) {
    this.documents.delete(key);
  }
}
