import { NotFoundError } from '../errors.js';
import { insertAt, lockAll, removeAt, reposition } from '../positionLedger.js';
import type { BoardDatabase, BoardTransaction, TransactionOptions } from '../db/types.js';
import type { Column, ColumnInput, ColumnPatch } from '../types.js';

export interface ColumnRepository {
  create(input: ColumnInput, options?: TransactionOptions): Promise<Column>;
  get(id: number, options?: TransactionOptions): Promise<Column>;
  list(options?: TransactionOptions): Promise<Column[]>;
  update(id: number, patch: ColumnPatch, options?: TransactionOptions): Promise<Column>;
  /** Deletes the column together with all of its tasks. */
  delete(id: number, options?: TransactionOptions): Promise<Column>;
  reorder(id: number, order: number, options?: TransactionOptions): Promise<Column>;
}

async function requireColumn(tx: BoardTransaction, id: number): Promise<Column> {
  const column = await tx.columns.find(id);
  if (!column) throw new NotFoundError('column', id);
  return column;
}

async function repositionColumn(tx: BoardTransaction, column: Column, requested: number): Promise<Column> {
  const target = await reposition(tx.columns.positions, column.order, requested);
  if (target === column.order) return column;
  const updated = await tx.columns.update(column.id, { order: target });
  if (!updated) throw new NotFoundError('column', column.id);
  return updated;
}

export class ColumnStore implements ColumnRepository {
  constructor(private readonly db: BoardDatabase) {}

  create(input: ColumnInput, options?: TransactionOptions): Promise<Column> {
    return this.db.transaction(async (tx) => {
      const positions = tx.columns.positions;
      await positions.lock();
      const order = await insertAt(positions, input.order);
      return tx.columns.insert({ title: input.title, order });
    }, options);
  }

  get(id: number, options?: TransactionOptions): Promise<Column> {
    return this.db.transaction((tx) => requireColumn(tx, id), options);
  }

  list(options?: TransactionOptions): Promise<Column[]> {
    return this.db.transaction((tx) => tx.columns.list(), options);
  }

  update(id: number, patch: ColumnPatch, options?: TransactionOptions): Promise<Column> {
    return this.db.transaction(async (tx) => {
      await tx.columns.positions.lock();
      let column = await requireColumn(tx, id);
      // order never changes through a plain field write
      if (patch.order !== undefined && patch.order !== column.order) {
        column = await repositionColumn(tx, column, patch.order);
      }
      if (patch.title !== undefined && patch.title !== column.title) {
        const updated = await tx.columns.update(id, { title: patch.title });
        if (!updated) throw new NotFoundError('column', id);
        column = updated;
      }
      return column;
    }, options);
  }

  delete(id: number, options?: TransactionOptions): Promise<Column> {
    return this.db.transaction(async (tx) => {
      await lockAll([tx.columns.positions, tx.tasks.positions(id)]);
      const column = await requireColumn(tx, id);
      await tx.tasks.deleteByColumn(id);
      await tx.columns.delete(id);
      await removeAt(tx.columns.positions, column.order);
      return column;
    }, options);
  }

  reorder(id: number, order: number, options?: TransactionOptions): Promise<Column> {
    return this.db.transaction(async (tx) => {
      await tx.columns.positions.lock();
      const column = await requireColumn(tx, id);
      return repositionColumn(tx, column, order);
    }, options);
  }
}
