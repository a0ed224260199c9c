import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MemoryRecordStore } from '../src/persistence/memoryStore.js';
import { loadCharacter, readRecord } from '../src/persistence/records.js';
import { CharacterSchema } from '../src/persistence/schemas.js';
import { FileRecordStore, baseName, joinKey } from '../src/persistence/store.js';
import { MalformedRecordError, MissingRecordError } from '../src/utils/errorhandler.js';
import { makeCharacter } from './helpers.js';

describe('FileRecordStore', () => {
  let root: string;
  let store: FileRecordStore;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'alter-ego-'));
    store = new FileRecordStore(root);
  });

  afterEach(() => {
    fs.removeSync(root);
  });

  it('writes pretty JSON files under the key path', () => {
    store.put('alter-egos/kei', { name: 'Kei' });

    const file = path.join(root, 'alter-egos', 'kei.json');
    expect(fs.readFileSync(file, 'utf8')).toBe('{\n  "name": "Kei"\n}\n');
    expect(store.get('alter-egos/kei')).toEqual({ name: 'Kei' });
  });

  it('returns undefined for a missing record', () => {
    expect(store.get('alter-egos/nobody')).toBeUndefined();
    expect(() => readRecord(store, 'alter-egos/nobody', CharacterSchema)).toThrow(MissingRecordError);
  });

  it('reports unparsable files as malformed', () => {
    fs.outputFileSync(path.join(root, 'history.json'), '[{');
    expect(() => store.get('history')).toThrow(MalformedRecordError);
  });

  it('lists only the records directly under a folder', () => {
    store.put('missions/completed/K02-b', {});
    store.put('missions/completed/K01-a', {});
    store.put('missions/not-completed/T01-c', {});
    fs.outputFileSync(path.join(root, 'missions', 'completed', '.gitkeep'), '');

    expect(store.list('missions/completed')).toEqual(['missions/completed/K01-a', 'missions/completed/K02-b']);
    expect(store.list('missions')).toEqual([]);
    expect(store.list('rewards/locked')).toEqual([]);
  });

  it('removes records', () => {
    store.put('checkins/2026-03-01', { date: '2026-03-01', habits: {} });
    store.remove('checkins/2026-03-01');
    expect(store.get('checkins/2026-03-01')).toBeUndefined();
  });

  it('refuses keys that leave the data root', () => {
    expect(() => store.get('../secrets')).toThrow('Invalid record key');
    expect(() => store.put('alter-egos//kei', {})).toThrow('Invalid record key');
  });
});

describe('MemoryRecordStore', () => {
  it('hands out copies', () => {
    const store = new MemoryRecordStore({ 'alter-egos/kei': makeCharacter({ name: 'Kei' }) });
    const kei = loadCharacter(store, 'kei');
    kei.level = 9;

    expect(loadCharacter(store, 'kei').level).toBe(1);
  });

  it('wraps unparsable text in a malformed record error', () => {
    const store = new MemoryRecordStore();
    store.putRaw('synergy', 'not json');
    expect(() => store.get('synergy')).toThrow(MalformedRecordError);
  });

  it('rejects records that fail their schema', () => {
    const store = new MemoryRecordStore({ 'alter-egos/tyler': { name: 'Tyler', level: 0 } });
    expect(() => loadCharacter(store, 'tyler')).toThrow(MalformedRecordError);
  });

  it('lists keys like the file store', () => {
    const store = new MemoryRecordStore({ 'rewards/locked/R2-b': {}, 'rewards/locked/R1-a': {}, 'rewards/x': {} });
    expect(store.list('rewards/locked')).toEqual(['rewards/locked/R1-a', 'rewards/locked/R2-b']);
    expect(store.list('rewards')).toEqual(['rewards/x']);
  });
});

describe('key helpers', () => {
  it('joins and splits keys', () => {
    expect(joinKey('missions/', '/completed', 'K01-a')).toBe('missions/completed/K01-a');
    expect(baseName('missions/completed/K01-a')).toBe('K01-a');
    expect(baseName('history')).toBe('history');
  });
});
