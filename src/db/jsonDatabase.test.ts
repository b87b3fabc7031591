import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConstraintViolationError, PoolTimeoutError } from '../errors.js';
import { JsonDatabase } from './jsonDatabase.js';

const now = () => '2026-01-01T00:00:00.000Z';

describe('JsonDatabase (in memory)', () => {
  it('starts with the default columns', async () => {
    const db = JsonDatabase.inMemory({ now });

    const columns = await db.transaction((tx) => tx.columns.list());

    expect(columns).toEqual([
      { id: 1, title: 'Todo', order: 0, createdAt: now() },
      { id: 2, title: 'In Progress', order: 1, createdAt: now() },
      { id: 3, title: 'Done', order: 2, createdAt: now() }
    ]);
  });

  it('rolls back everything when work throws', async () => {
    const db = JsonDatabase.inMemory({ now });

    await expect(
      db.transaction(async (tx) => {
        await tx.columns.positions.shift({ from: 0 }, 1);
        await tx.columns.insert({ title: 'Backlog', order: 0 });
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    const columns = await db.transaction((tx) => tx.columns.list());
    expect(columns.map((c) => `${c.title}:${c.order}`)).toEqual(['Todo:0', 'In Progress:1', 'Done:2']);
    expect(db.revision).toBe(0);
  });

  it('refuses to commit two siblings with the same order', async () => {
    const db = JsonDatabase.inMemory({ now });

    await expect(db.transaction((tx) => tx.columns.insert({ title: 'Clash', order: 1 }))).rejects.toBeInstanceOf(
      ConstraintViolationError
    );

    const columns = await db.transaction((tx) => tx.columns.list());
    expect(columns).toHaveLength(3);
  });

  it('bumps the revision only for transactions that write', async () => {
    const db = JsonDatabase.inMemory({ now });

    await db.transaction((tx) => tx.columns.list());
    expect(db.revision).toBe(0);

    await db.transaction((tx) => tx.columns.insert({ title: 'Archive', order: 3 }));
    expect(db.revision).toBe(1);
  });

  it('does not hand out references into committed state', async () => {
    const db = JsonDatabase.inMemory({ now });

    const column = await db.transaction((tx) => tx.columns.find(1));
    if (column) column.title = 'Mutated';

    const again = await db.transaction((tx) => tx.columns.find(1));
    expect(again?.title).toBe('Todo');
  });

  it('runs one transaction at a time', async () => {
    const db = JsonDatabase.inMemory({ now });
    const events: string[] = [];
    let finishFirst: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      finishFirst = () => resolve();
    });

    const first = db.transaction(async () => {
      events.push('first:start');
      await gate;
      events.push('first:end');
    });
    const second = db.transaction(async () => {
      events.push('second:start');
    });

    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(events).toEqual(['first:start']);

    finishFirst();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('gives up waiting after the acquire timeout', async () => {
    const db = JsonDatabase.inMemory({ now, acquireTimeoutMs: 20 });
    let finishFirst: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      finishFirst = () => resolve();
    });

    const first = db.transaction(() => gate);

    await expect(db.transaction((tx) => tx.columns.list())).rejects.toBeInstanceOf(PoolTimeoutError);

    finishFirst();
    await first;
  });
});

describe('JsonDatabase (file)', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'taskboard-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates the board file with defaults on first use', async () => {
    const db = JsonDatabase.fromWorkspace(dir, 'board.json', { now });

    await db.transaction((tx) => tx.columns.list());

    const saved = JSON.parse(await readFile(join(dir, 'board.json'), 'utf-8'));
    expect(saved.version).toBe(1);
    expect(saved.revision).toBe(0);
    expect(saved.columns.map((c: { title: string }) => c.title)).toEqual(['Todo', 'In Progress', 'Done']);
  });

  it('persists committed writes for the next process', async () => {
    const first = JsonDatabase.fromWorkspace(dir, 'board.json', { now });
    await first.transaction(async (tx) => {
      const column = await tx.columns.find(1);
      if (!column) throw new Error('missing column');
      await tx.tasks.insert({ title: 'Write docs', columnId: column.id, order: 0 });
    });

    const second = JsonDatabase.fromWorkspace(dir, 'board.json', { now });
    const tasks = await second.transaction((tx) => tx.tasks.list());

    expect(tasks).toEqual([{ id: 1, title: 'Write docs', columnId: 1, order: 0, createdAt: now() }]);
    expect(second.revision).toBe(1);
  });

  it('refuses a board file it cannot read', async () => {
    await writeFile(join(dir, 'board.json'), JSON.stringify({ version: 2 }), 'utf-8');
    const db = JsonDatabase.fromWorkspace(dir, 'board.json', { now });

    await expect(db.transaction((tx) => tx.columns.list())).rejects.toThrow();
  });
});
