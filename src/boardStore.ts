import type { AppConfig } from './config.js';
import { openDatabase } from './db/index.js';
import { COLUMN_SET_KEY, taskSetKey, type BoardDatabase, type TransactionOptions } from './db/types.js';
import { findOrderViolations, type OrderViolation } from './positionLedger.js';
import { ColumnStore } from './stores/columnStore.js';
import { TaskStore } from './stores/taskStore.js';
import { TodoStore } from './stores/todoStore.js';
import { UserStore } from './stores/userStore.js';
import type { BoardSnapshot, Task } from './types.js';

/**
 * One store per entity, all sharing a single database handle. Built once per
 * process and handed to the request layer.
 */
export class BoardStore {
  readonly columns: ColumnStore;
  readonly tasks: TaskStore;
  readonly users: UserStore;
  readonly todos: TodoStore;

  constructor(readonly db: BoardDatabase) {
    this.columns = new ColumnStore(db);
    this.tasks = new TaskStore(db);
    this.users = new UserStore(db);
    this.todos = new TodoStore(db);
  }

  static open(config: AppConfig): BoardStore {
    return new BoardStore(openDatabase(config));
  }

  /** Columns in order, each with its tasks in order, read in one transaction. */
  snapshot(options?: TransactionOptions): Promise<BoardSnapshot> {
    return this.db.transaction(async (tx) => {
      const columns = await tx.columns.list();
      const tasks = await tx.tasks.list();
      const byColumn = new Map<number, Task[]>();
      for (const t of tasks) {
        const list = byColumn.get(t.columnId) ?? [];
        list.push(t);
        byColumn.set(t.columnId, list);
      }
      return { columns: columns.map((c) => ({ ...c, tasks: byColumn.get(c.id) ?? [] })) };
    }, { ...options, consistency: 'snapshot' });
  }

  /** Lists every gap or duplicate order. Nothing is repaired. */
  verify(options?: TransactionOptions): Promise<OrderViolation[]> {
    return this.db.transaction(async (tx) => {
      const columns = await tx.columns.list();
      const tasks = await tx.tasks.list();
      return [
        ...findOrderViolations(columns, () => COLUMN_SET_KEY),
        ...findOrderViolations(tasks, (t) => taskSetKey(t.columnId))
      ];
    }, { ...options, consistency: 'snapshot' });
  }

  close(): Promise<void> {
    return this.db.close();
  }
}
