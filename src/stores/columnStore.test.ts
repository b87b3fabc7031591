import { beforeEach, describe, it, expect } from 'vitest';
import { BoardStore } from '../boardStore.js';
import { JsonDatabase } from '../db/jsonDatabase.js';
import { NotFoundError } from '../errors.js';

const now = () => '2026-01-01T00:00:00.000Z';

describe('ColumnStore', () => {
  let db: JsonDatabase;
  let board: BoardStore;

  beforeEach(() => {
    db = JsonDatabase.inMemory({ now });
    board = new BoardStore(db);
  });

  async function titles(): Promise<string[]> {
    const columns = await board.columns.list();
    return columns.map((c) => `${c.title}:${c.order}`);
  }

  it('lists the default columns in order', async () => {
    expect(await titles()).toEqual(['Todo:0', 'In Progress:1', 'Done:2']);
  });

  it('appends a new column by default', async () => {
    const column = await board.columns.create({ title: 'Archive' });

    expect(column).toEqual({ id: 4, title: 'Archive', order: 3, createdAt: now() });
  });

  it('inserts at the front and shifts the others', async () => {
    await board.columns.create({ title: 'Backlog', order: 0 });

    expect(await titles()).toEqual(['Backlog:0', 'Todo:1', 'In Progress:2', 'Done:3']);
  });

  it('reorders a column to the front', async () => {
    const moved = await board.columns.reorder(3, 0);

    expect(moved.order).toBe(0);
    expect(await titles()).toEqual(['Done:0', 'Todo:1', 'In Progress:2']);
  });

  it('applies an order change and a rename together', async () => {
    const column = await board.columns.update(1, { title: 'Ready', order: 2 });

    expect(column).toMatchObject({ id: 1, title: 'Ready', order: 2 });
    expect(await titles()).toEqual(['In Progress:0', 'Done:1', 'Ready:2']);
  });

  it('writes nothing when the patch changes nothing', async () => {
    await board.columns.update(2, { title: 'In Progress', order: 1 });

    expect(db.revision).toBe(0);
  });

  it('deletes a column with its tasks and closes the gap', async () => {
    await board.tasks.create({ title: 'A', columnId: 2 });
    await board.tasks.create({ title: 'B', columnId: 2 });
    await board.tasks.create({ title: 'Keep', columnId: 3 });

    const removed = await board.columns.delete(2);

    expect(removed.title).toBe('In Progress');
    expect(await titles()).toEqual(['Todo:0', 'Done:1']);
    const tasks = await board.tasks.list();
    expect(tasks.map((t) => t.title)).toEqual(['Keep']);
    expect(await board.verify()).toEqual([]);
  });

  it('reports a missing column', async () => {
    await expect(board.columns.get(9)).rejects.toBeInstanceOf(NotFoundError);
    await expect(board.columns.update(9, { title: 'x' })).rejects.toBeInstanceOf(NotFoundError);
    await expect(board.columns.reorder(9, 0)).rejects.toBeInstanceOf(NotFoundError);
    await expect(board.columns.delete(9)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('builds a snapshot of columns with their tasks', async () => {
    await board.tasks.create({ title: 'A', columnId: 1 });
    await board.tasks.create({ title: 'B', columnId: 1, order: 0 });

    const snapshot = await board.snapshot();

    expect(snapshot.columns.map((c) => [c.title, c.tasks.map((t) => `${t.title}:${t.order}`)])).toEqual([
      ['Todo', ['B:0', 'A:1']],
      ['In Progress', []],
      ['Done', []]
    ]);
  });
});
