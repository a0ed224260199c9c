import { describe, expect, it } from 'vitest';
import type { NewHistoryEntry, PersonaId } from '../src/models.js';
import { emptyDelta, snapshotOf } from '../src/engine/stats.js';
import { MemoryRecordStore } from '../src/persistence/memoryStore.js';
import { appendHistory, historyFor, nextHistoryIndex, readHistory } from '../src/systems/history.js';
import { makeCharacter } from './helpers.js';

function entry(persona: PersonaId, date = '2026-03-01'): NewHistoryEntry {
  return { persona, event: 'habit-reward', delta: emptyDelta(), snapshot: snapshotOf(makeCharacter()), date };
}

describe('history ledger', () => {
  it('numbers entries from 1 without gaps', () => {
    const store = new MemoryRecordStore();
    const indices = (['tyler', 'kei', 'mr-robot', 'kei'] as const).map(
      (persona) => appendHistory(store, entry(persona)).history_index
    );

    expect(indices).toEqual([1, 2, 3, 4]);
    expect(readHistory(store).map((e) => e.history_index)).toEqual([1, 2, 3, 4]);
  });

  it('filters entries by persona', () => {
    const store = new MemoryRecordStore();
    appendHistory(store, entry('tyler'));
    appendHistory(store, entry('kei', '2026-03-02'));
    appendHistory(store, entry('tyler', '2026-03-03'));

    expect(historyFor(store, 'tyler').map((e) => e.date)).toEqual(['2026-03-01', '2026-03-03']);
  });

  it('continues after the highest stored index and keeps legacy entries', () => {
    const legacy = { history_index: 7, note: 'imported' };
    const store = new MemoryRecordStore({ history: [legacy] });

    const recorded = appendHistory(store, entry('kei'));

    expect(recorded.history_index).toBe(8);
    expect(store.get('history')).toEqual([legacy, recorded]);
    expect(readHistory(store)).toEqual([recorded]);
  });

  it('starts over when the ledger cannot be read', () => {
    const store = new MemoryRecordStore();
    store.putRaw('history', '[{"history_index": 1,');
    expect(appendHistory(store, entry('tyler')).history_index).toBe(1);

    const notAList = new MemoryRecordStore({ history: { history_index: 4 } });
    expect(appendHistory(notAList, entry('tyler')).history_index).toBe(1);
  });

  it('ignores non-numeric indices when picking the next one', () => {
    expect(nextHistoryIndex([])).toBe(1);
    expect(nextHistoryIndex([{ history_index: '9' }, { history_index: 2 }, null])).toBe(3);
  });
});
