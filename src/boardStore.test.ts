import { describe, it, expect } from 'vitest';
import { BoardStore } from './boardStore.js';
import { JsonDatabase } from './db/jsonDatabase.js';
import type { BoardDatabase, BoardTransaction, TransactionOptions } from './db/types.js';

const now = () => '2026-01-01T00:00:00.000Z';

class RecordingDatabase implements BoardDatabase {
  readonly kind = 'json';
  readonly calls: Array<TransactionOptions | undefined> = [];
  private readonly inner = JsonDatabase.inMemory({ now });

  transaction<T>(work: (tx: BoardTransaction) => Promise<T>, options?: TransactionOptions): Promise<T> {
    this.calls.push(options);
    return this.inner.transaction(work, options);
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}

describe('BoardStore', () => {
  it('reads the snapshot from one consistent view', async () => {
    const db = new RecordingDatabase();
    const board = new BoardStore(db);
    const controller = new AbortController();

    await board.snapshot({ signal: controller.signal });

    expect(db.calls).toEqual([{ signal: controller.signal, consistency: 'snapshot' }]);
  });

  it('verifies from one consistent view', async () => {
    const db = new RecordingDatabase();
    const board = new BoardStore(db);

    expect(await board.verify()).toEqual([]);
    expect(db.calls).toEqual([{ consistency: 'snapshot' }]);
  });

  it('leaves ordinary writes at the default consistency', async () => {
    const db = new RecordingDatabase();
    const board = new BoardStore(db);

    await board.tasks.create({ title: 'A', columnId: 1 });

    expect(db.calls).toEqual([undefined]);
  });
});
