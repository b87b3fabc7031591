import type { OrderedSet } from '../positionLedger.js';
import type { Column, Task, Todo, User } from '../types.js';

export type NewColumn = Pick<Column, 'title' | 'order'>;
export type ColumnValues = Partial<Pick<Column, 'title' | 'order'>>;

export type NewTask = Pick<Task, 'title' | 'description' | 'columnId' | 'order'>;
export type TaskValues = {
  title?: string;
  description?: string | null;
  columnId?: number;
  order?: number;
};

export type NewUser = Pick<User, 'name' | 'email' | 'avatarUrl'>;
export type UserValues = {
  name?: string;
  email?: string;
  avatarUrl?: string | null;
};

export type NewTodo = Pick<Todo, 'title' | 'description' | 'completed'>;
export type TodoValues = {
  title?: string;
  description?: string | null;
  completed?: boolean;
};

export interface ColumnTable {
  readonly positions: OrderedSet;
  find(id: number): Promise<Column | undefined>;
  /** Ordered by position. */
  list(): Promise<Column[]>;
  insert(values: NewColumn): Promise<Column>;
  update(id: number, values: ColumnValues): Promise<Column | undefined>;
  delete(id: number): Promise<Column | undefined>;
}

export interface TaskTable {
  positions(columnId: number): OrderedSet;
  find(id: number): Promise<Task | undefined>;
  /** Ordered by column, then position. */
  list(): Promise<Task[]>;
  listByColumn(columnId: number): Promise<Task[]>;
  insert(values: NewTask): Promise<Task>;
  update(id: number, values: TaskValues): Promise<Task | undefined>;
  delete(id: number): Promise<Task | undefined>;
  deleteByColumn(columnId: number): Promise<number>;
}

export interface UserTable {
  find(id: number): Promise<User | undefined>;
  findByEmail(email: string): Promise<User | undefined>;
  /** Newest first. */
  list(): Promise<User[]>;
  insert(values: NewUser): Promise<User>;
  update(id: number, values: UserValues): Promise<User | undefined>;
  delete(id: number): Promise<User | undefined>;
}

export interface TodoTable {
  find(id: number): Promise<Todo | undefined>;
  /** Newest first. */
  list(): Promise<Todo[]>;
  insert(values: NewTodo): Promise<Todo>;
  update(id: number, values: TodoValues): Promise<Todo | undefined>;
  delete(id: number): Promise<Todo | undefined>;
}

export interface BoardTransaction {
  readonly columns: ColumnTable;
  readonly tasks: TaskTable;
  readonly users: UserTable;
  readonly todos: TodoTable;
}

export type TransactionOptions = {
  /** Abandons the request while it still waits for a slot. */
  signal?: AbortSignal;
  /**
   * `snapshot` reads every statement from one consistent view. The JSON
   * backend already admits one transaction at a time, so only Postgres acts
   * on it.
   */
  consistency?: 'statement' | 'snapshot';
};

/**
 * Every call to `transaction` commits as a unit or not at all. Once `work`
 * has started it runs to completion or rolls back, even if the caller's
 * signal fires.
 */
export interface BoardDatabase {
  readonly kind: 'json' | 'postgres';
  transaction<T>(work: (tx: BoardTransaction) => Promise<T>, options?: TransactionOptions): Promise<T>;
  close(): Promise<void>;
}

export const COLUMN_SET_KEY = 'columns';

export function taskSetKey(columnId: number): string {
  return `column:${columnId}:tasks`;
}
