import { beforeEach, describe, it, expect } from 'vitest';
import { BoardStore } from '../boardStore.js';
import { JsonDatabase } from '../db/jsonDatabase.js';
import { NotFoundError, ReferenceInvalidError } from '../errors.js';

const now = () => '2026-01-01T00:00:00.000Z';

// default board: Todo (1), In Progress (2), Done (3)
const TODO = 1;
const DOING = 2;

describe('TaskStore', () => {
  let db: JsonDatabase;
  let board: BoardStore;

  beforeEach(() => {
    db = JsonDatabase.inMemory({ now });
    board = new BoardStore(db);
  });

  async function seed(columnId: number, ...titles: string[]): Promise<Map<string, number>> {
    const ids = new Map<string, number>();
    for (const title of titles) {
      const task = await board.tasks.create({ title, columnId });
      ids.set(title, task.id);
    }
    return ids;
  }

  async function layout(columnId: number): Promise<string[]> {
    const tasks = await board.tasks.listByColumn(columnId);
    return tasks.map((t) => `${t.title}:${t.order}`);
  }

  function idOf(ids: Map<string, number>, title: string): number {
    const id = ids.get(title);
    if (id === undefined) throw new Error(`no task ${title}`);
    return id;
  }

  describe('create', () => {
    it('appends when no order is given', async () => {
      await seed(TODO, 'A', 'B');

      const task = await board.tasks.create({ title: 'C', description: 'third', columnId: TODO });

      expect(task).toEqual({ id: 3, title: 'C', description: 'third', columnId: TODO, order: 2, createdAt: now() });
    });

    it('inserts at the requested order and shifts the rest', async () => {
      await seed(TODO, 'A', 'B', 'C');

      const task = await board.tasks.create({ title: 'N', columnId: TODO, order: 1 });

      expect(task.order).toBe(1);
      expect(await layout(TODO)).toEqual(['A:0', 'N:1', 'B:2', 'C:3']);
    });

    it('clamps an order past the end', async () => {
      await seed(TODO, 'A');

      const task = await board.tasks.create({ title: 'B', columnId: TODO, order: 40 });

      expect(task.order).toBe(1);
    });

    it('leaves other columns alone', async () => {
      await seed(DOING, 'X');

      await board.tasks.create({ title: 'A', columnId: TODO, order: 0 });

      expect(await layout(DOING)).toEqual(['X:0']);
    });

    it('rejects a column that does not exist', async () => {
      await expect(board.tasks.create({ title: 'A', columnId: 99 })).rejects.toBeInstanceOf(ReferenceInvalidError);
      expect(await board.tasks.list()).toEqual([]);
    });
  });

  describe('reads', () => {
    it('lists all tasks by column, then order', async () => {
      await seed(DOING, 'X');
      await seed(TODO, 'A', 'B');

      const tasks = await board.tasks.list();

      expect(tasks.map((t) => `${t.columnId}/${t.title}:${t.order}`)).toEqual(['1/A:0', '1/B:1', '2/X:0']);
    });

    it('reports a missing task or column', async () => {
      await expect(board.tasks.get(7)).rejects.toBeInstanceOf(NotFoundError);
      await expect(board.tasks.listByColumn(99)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('reorder', () => {
    it('moves D up to order 1', async () => {
      const ids = await seed(TODO, 'A', 'B', 'C', 'D');

      const moved = await board.tasks.reorder(idOf(ids, 'D'), 1);

      expect(moved.order).toBe(1);
      expect(await layout(TODO)).toEqual(['A:0', 'D:1', 'B:2', 'C:3']);
    });

    it('round-trips back to the original ordering', async () => {
      const ids = await seed(TODO, 'A', 'B', 'C', 'D', 'E');

      await board.tasks.reorder(idOf(ids, 'B'), 3);
      expect(await layout(TODO)).toEqual(['A:0', 'C:1', 'D:2', 'B:3', 'E:4']);

      await board.tasks.reorder(idOf(ids, 'B'), 1);
      expect(await layout(TODO)).toEqual(['A:0', 'B:1', 'C:2', 'D:3', 'E:4']);
    });

    it('clamps to the last position', async () => {
      const ids = await seed(TODO, 'A', 'B', 'C');

      await board.tasks.reorder(idOf(ids, 'A'), 10);

      expect(await layout(TODO)).toEqual(['B:0', 'C:1', 'A:2']);
    });

    it('writes nothing when the order does not change', async () => {
      const ids = await seed(TODO, 'A', 'B');
      const revision = db.revision;

      const task = await board.tasks.reorder(idOf(ids, 'B'), 1);

      expect(task.order).toBe(1);
      expect(db.revision).toBe(revision);
    });

    it('reports a missing task', async () => {
      await expect(board.tasks.reorder(5, 0)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('update', () => {
    it('routes an order change through repositioning', async () => {
      const ids = await seed(TODO, 'A', 'B', 'C');

      const task = await board.tasks.update(idOf(ids, 'C'), { order: 0, title: 'C!' });

      expect(task).toMatchObject({ title: 'C!', order: 0 });
      expect(await layout(TODO)).toEqual(['C!:0', 'A:1', 'B:2']);
    });

    it('sets and clears the description', async () => {
      const ids = await seed(TODO, 'A');

      const described = await board.tasks.update(idOf(ids, 'A'), { description: 'details' });
      expect(described.description).toBe('details');

      const cleared = await board.tasks.update(idOf(ids, 'A'), { description: null });
      expect(cleared.description).toBeUndefined();
    });

    it('writes nothing for an empty patch', async () => {
      const ids = await seed(TODO, 'A');
      const revision = db.revision;

      await board.tasks.update(idOf(ids, 'A'), {});

      expect(db.revision).toBe(revision);
    });

    it('reports a missing task', async () => {
      await expect(board.tasks.update(5, { title: 'x' })).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('delete', () => {
    it('closes the gap in its column', async () => {
      const ids = await seed(TODO, 'A', 'B', 'C');

      const removed = await board.tasks.delete(idOf(ids, 'B'));

      expect(removed.title).toBe('B');
      expect(await layout(TODO)).toEqual(['A:0', 'C:1']);
    });

    it('reinserting at the removed order restores the sequence length and relative order', async () => {
      const ids = await seed(TODO, 'A', 'B', 'C', 'D');

      await board.tasks.delete(idOf(ids, 'C'));
      await board.tasks.create({ title: 'N', columnId: TODO, order: 2 });

      expect(await layout(TODO)).toEqual(['A:0', 'B:1', 'N:2', 'D:3']);
    });

    it('reports a missing task', async () => {
      await expect(board.tasks.delete(5)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('move', () => {
    it('moves A from X to the top of Y', async () => {
      const ids = await seed(TODO, 'A', 'B');
      await seed(DOING, 'C');

      const moved = await board.tasks.move(idOf(ids, 'A'), DOING, 0);

      expect(moved).toMatchObject({ title: 'A', columnId: DOING, order: 0 });
      expect(await layout(TODO)).toEqual(['B:0']);
      expect(await layout(DOING)).toEqual(['A:0', 'C:1']);
    });

    it('keeps both columns dense for a move into the middle', async () => {
      const ids = await seed(TODO, 'A', 'B', 'C');
      await seed(DOING, 'X', 'Y', 'Z');

      await board.tasks.move(idOf(ids, 'B'), DOING, 2);

      expect(await layout(TODO)).toEqual(['A:0', 'C:1']);
      expect(await layout(DOING)).toEqual(['X:0', 'Y:1', 'B:2', 'Z:3']);
      expect(await board.verify()).toEqual([]);
    });

    it('appends to the target when no order is given', async () => {
      const ids = await seed(TODO, 'A');
      await seed(DOING, 'X');

      const moved = await board.tasks.move(idOf(ids, 'A'), DOING);

      expect(moved.order).toBe(1);
      expect(await layout(TODO)).toEqual([]);
    });

    it('repositions within the same column', async () => {
      const ids = await seed(TODO, 'A', 'B', 'C');

      await board.tasks.move(idOf(ids, 'A'), TODO, 2);

      expect(await layout(TODO)).toEqual(['B:0', 'C:1', 'A:2']);
    });

    it('rejects a target column that does not exist', async () => {
      const ids = await seed(TODO, 'A', 'B');

      await expect(board.tasks.move(idOf(ids, 'A'), 99, 0)).rejects.toBeInstanceOf(ReferenceInvalidError);
      expect(await layout(TODO)).toEqual(['A:0', 'B:1']);
    });

    it('reports a missing task', async () => {
      await expect(board.tasks.move(5, DOING, 0)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('concurrent callers', () => {
    it('keeps every column dense under interleaved requests', async () => {
      const ids = await seed(TODO, 'A', 'B', 'C', 'D');
      await seed(DOING, 'X', 'Y');

      await Promise.all([
        board.tasks.create({ title: 'N1', columnId: TODO, order: 0 }),
        board.tasks.create({ title: 'N2', columnId: TODO, order: 0 }),
        board.tasks.move(idOf(ids, 'B'), DOING, 1),
        board.tasks.reorder(idOf(ids, 'D'), 0),
        board.tasks.delete(idOf(ids, 'A')),
        board.tasks.create({ title: 'N3', columnId: DOING })
      ]);

      expect(await board.verify()).toEqual([]);
      expect(await board.tasks.listByColumn(TODO)).toHaveLength(4);
      expect(await board.tasks.listByColumn(DOING)).toHaveLength(4);
    });
  });
});
