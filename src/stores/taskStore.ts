import { NotFoundError, ReferenceInvalidError } from '../errors.js';
import { insertAt, lockAll, moveAcross, removeAt, reposition } from '../positionLedger.js';
import type { BoardDatabase, BoardTransaction, TaskValues, TransactionOptions } from '../db/types.js';
import type { Task, TaskInput, TaskPatch } from '../types.js';

export interface TaskRepository {
  create(input: TaskInput, options?: TransactionOptions): Promise<Task>;
  get(id: number, options?: TransactionOptions): Promise<Task>;
  /** All tasks, ordered by column then position. */
  list(options?: TransactionOptions): Promise<Task[]>;
  listByColumn(columnId: number, options?: TransactionOptions): Promise<Task[]>;
  update(id: number, patch: TaskPatch, options?: TransactionOptions): Promise<Task>;
  delete(id: number, options?: TransactionOptions): Promise<Task>;
  reorder(id: number, order: number, options?: TransactionOptions): Promise<Task>;
  /** Omitting `order` appends the task to the target column. */
  move(id: number, columnId: number, order?: number, options?: TransactionOptions): Promise<Task>;
}

/**
 * Locks the task's current column (and `alsoColumn`, when given) and returns
 * the task as seen under those locks. Retries if a concurrent move changed
 * the task's column before the lock was granted; locks from the earlier pass
 * stay held, so a retry may deadlock, which Postgres reports as ContentionError.
 */
async function lockTask(tx: BoardTransaction, id: number, alsoColumn?: number): Promise<Task> {
  for (;;) {
    const seen = await tx.tasks.find(id);
    if (!seen) throw new NotFoundError('task', id);

    const sets = [tx.tasks.positions(seen.columnId)];
    if (alsoColumn !== undefined) sets.push(tx.tasks.positions(alsoColumn));
    await lockAll(sets);

    const current = await tx.tasks.find(id);
    if (!current) throw new NotFoundError('task', id);
    if (current.columnId === seen.columnId) return current;
  }
}

async function writeTask(tx: BoardTransaction, id: number, values: TaskValues): Promise<Task> {
  const updated = await tx.tasks.update(id, values);
  if (!updated) throw new NotFoundError('task', id);
  return updated;
}

async function repositionTask(tx: BoardTransaction, task: Task, requested: number): Promise<Task> {
  const target = await reposition(tx.tasks.positions(task.columnId), task.order, requested);
  if (target === task.order) return task;
  return writeTask(tx, task.id, { order: target });
}

async function requireColumnReference(tx: BoardTransaction, columnId: number): Promise<void> {
  const column = await tx.columns.find(columnId);
  if (!column) throw new ReferenceInvalidError('column', columnId);
}

export class TaskStore implements TaskRepository {
  constructor(private readonly db: BoardDatabase) {}

  create(input: TaskInput, options?: TransactionOptions): Promise<Task> {
    return this.db.transaction(async (tx) => {
      const positions = tx.tasks.positions(input.columnId);
      await positions.lock();
      await requireColumnReference(tx, input.columnId);
      const order = await insertAt(positions, input.order);
      return tx.tasks.insert({
        title: input.title,
        description: input.description,
        columnId: input.columnId,
        order
      });
    }, options);
  }

  get(id: number, options?: TransactionOptions): Promise<Task> {
    return this.db.transaction(async (tx) => {
      const task = await tx.tasks.find(id);
      if (!task) throw new NotFoundError('task', id);
      return task;
    }, options);
  }

  list(options?: TransactionOptions): Promise<Task[]> {
    return this.db.transaction((tx) => tx.tasks.list(), options);
  }

  listByColumn(columnId: number, options?: TransactionOptions): Promise<Task[]> {
    return this.db.transaction(async (tx) => {
      const column = await tx.columns.find(columnId);
      if (!column) throw new NotFoundError('column', columnId);
      return tx.tasks.listByColumn(columnId);
    }, options);
  }

  update(id: number, patch: TaskPatch, options?: TransactionOptions): Promise<Task> {
    return this.db.transaction(async (tx) => {
      let task = await lockTask(tx, id);
      if (patch.order !== undefined && patch.order !== task.order) {
        task = await repositionTask(tx, task, patch.order);
      }

      const values: TaskValues = {};
      if (patch.title !== undefined && patch.title !== task.title) values.title = patch.title;
      if (patch.description === null && task.description !== undefined) values.description = null;
      if (typeof patch.description === 'string' && patch.description !== task.description) {
        values.description = patch.description;
      }
      if (Object.keys(values).length === 0) return task;
      return writeTask(tx, id, values);
    }, options);
  }

  delete(id: number, options?: TransactionOptions): Promise<Task> {
    return this.db.transaction(async (tx) => {
      const task = await lockTask(tx, id);
      await tx.tasks.delete(id);
      await removeAt(tx.tasks.positions(task.columnId), task.order);
      return task;
    }, options);
  }

  reorder(id: number, order: number, options?: TransactionOptions): Promise<Task> {
    return this.db.transaction(async (tx) => {
      const task = await lockTask(tx, id);
      return repositionTask(tx, task, order);
    }, options);
  }

  move(id: number, columnId: number, order?: number, options?: TransactionOptions): Promise<Task> {
    return this.db.transaction(async (tx) => {
      const task = await lockTask(tx, id, columnId);
      await requireColumnReference(tx, columnId);

      if (task.columnId === columnId) {
        return repositionTask(tx, task, order ?? Number.MAX_SAFE_INTEGER);
      }

      return moveAcross(
        tx.tasks.positions(task.columnId),
        tx.tasks.positions(columnId),
        task.order,
        order,
        (target) => writeTask(tx, id, { columnId, order: target })
      );
    }, options);
  }
}
