import fs from 'fs-extra';
import path from 'path';
import { MalformedRecordError } from '../utils/errorhandler.js';

/**
 * Key-based access to JSON documents. Keys are slash-separated
 * (`alter-egos/kei`, `missions/completed/K01-meditate`); `list` returns the
 * keys directly under a folder prefix, sorted.
 */
export interface RecordStore {
  get(key: string): unknown | undefined;
  put(key: string, document: unknown): void;
  list(prefix: string): string[];
  remove(key: string): void;
}

export function joinKey(...parts: string[]): string {
  return parts.map((p) => p.replace(/^\/+|\/+$/g, '')).filter(Boolean).join('/');
}

export function baseName(key: string): string {
  const ix = key.lastIndexOf('/');
  return ix === -1 ? key : key.slice(ix + 1);
}

function assertKey(key: string) {
  if (!key || key.split('/').some((segment) => segment === '..' || segment === '')) {
    throw new Error(`Invalid record key: "${key}"`);
  }
}

export class FileRecordStore implements RecordStore {
  constructor(private readonly root: string) {}

  private fileFor(key: string) {
    assertKey(key);
    return path.join(this.root, `${key}.json`);
  }

  get(key: string): unknown | undefined {
    const file = this.fileFor(key);
    if (!fs.pathExistsSync(file)) return undefined;
    try {
      const document: unknown = fs.readJSONSync(file);
      return document;
    } catch (err) {
      throw new MalformedRecordError(key, err instanceof Error ? err.message : String(err), { file });
    }
  }

  put(key: string, document: unknown) {
    fs.outputJSONSync(this.fileFor(key), document, { spaces: 2 });
  }

  list(prefix: string): string[] {
    const folder = joinKey(prefix);
    const dir = path.join(this.root, folder);
    if (!fs.pathExistsSync(dir)) return [];
    return fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
      .map((entry) => joinKey(folder, entry.name.slice(0, -'.json'.length)))
      .sort();
  }

  remove(key: string) {
    fs.removeSync(this.fileFor(key));
  }
}
