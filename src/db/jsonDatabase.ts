import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { ConstraintViolationError } from '../errors.js';
import { findOrderViolations, type OrderRange, type OrderedSet } from '../positionLedger.js';
import { BoardFileSchema, type BoardFile } from '../schema.js';
import type { Column, Task, Todo, User } from '../types.js';
import { Semaphore } from './semaphore.js';
import {
  COLUMN_SET_KEY,
  taskSetKey,
  type BoardDatabase,
  type BoardTransaction,
  type ColumnTable,
  type ColumnValues,
  type NewColumn,
  type NewTask,
  type NewTodo,
  type NewUser,
  type TaskTable,
  type TaskValues,
  type TodoTable,
  type TodoValues,
  type TransactionOptions,
  type UserTable,
  type UserValues
} from './types.js';

export const DEFAULT_COLUMN_TITLES = ['Todo', 'In Progress', 'Done'];

export type JsonDatabaseOptions = {
  acquireTimeoutMs?: number;
  now?: () => string;
};

function nowIso(): string {
  return new Date().toISOString();
}

function defaultBoard(createdAt: string): BoardFile {
  return {
    version: 1,
    revision: 0,
    sequences: { columns: DEFAULT_COLUMN_TITLES.length, tasks: 0, users: 0, todos: 0 },
    columns: DEFAULT_COLUMN_TITLES.map((title, order) => ({ id: order + 1, title, order, createdAt })),
    tasks: [],
    users: [],
    todos: []
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function byOrder(a: { order: number; id: number }, b: { order: number; id: number }): number {
  return (a.order - b.order) || (a.id - b.id);
}

function byNewest(a: { createdAt: string; id: number }, b: { createdAt: string; id: number }): number {
  return b.createdAt.localeCompare(a.createdAt) || (b.id - a.id);
}

/**
 * Board persisted as one JSON document. A transaction works on a copy of the
 * last committed board and replaces it (file first, then memory) only when
 * `work` resolves. One transaction runs at a time.
 */
export class JsonDatabase implements BoardDatabase {
  readonly kind = 'json';
  private readonly slots = new Semaphore(1);
  private readonly acquireTimeoutMs: number;
  private readonly now: () => string;
  private committed: BoardFile | undefined;

  constructor(private readonly boardPath: string | undefined, options: JsonDatabaseOptions = {}) {
    this.acquireTimeoutMs = options.acquireTimeoutMs ?? 5000;
    this.now = options.now ?? nowIso;
  }

  static fromWorkspace(workspacePath: string, relativeBoardPath = '.taskboard/board.json', options?: JsonDatabaseOptions): JsonDatabase {
    return new JsonDatabase(resolve(workspacePath, relativeBoardPath), options);
  }

  static inMemory(options?: JsonDatabaseOptions): JsonDatabase {
    return new JsonDatabase(undefined, options);
  }

  get path(): string | undefined {
    return this.boardPath;
  }

  /** Number of committed transactions that changed something. */
  get revision(): number {
    return this.committed?.revision ?? 0;
  }

  async load(): Promise<BoardFile> {
    if (!this.boardPath) return defaultBoard(this.now());

    let text: string;
    try {
      text = await readFile(this.boardPath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      const board = defaultBoard(this.now());
      await this.save(board);
      return board;
    }
    return BoardFileSchema.parse(JSON.parse(text));
  }

  private async save(board: BoardFile): Promise<void> {
    if (!this.boardPath) return;
    const safeBoard = BoardFileSchema.parse(board);
    await mkdir(dirname(this.boardPath), { recursive: true });
    await writeFile(`${this.boardPath}.tmp`, JSON.stringify(safeBoard, null, 2), 'utf-8');
    await rename(`${this.boardPath}.tmp`, this.boardPath);
  }

  async transaction<T>(work: (tx: BoardTransaction) => Promise<T>, options?: TransactionOptions): Promise<T> {
    const release = await this.slots.acquire({ timeoutMs: this.acquireTimeoutMs, signal: options?.signal });
    try {
      if (!this.committed) this.committed = await this.load();
      const tx = new JsonTransaction(structuredClone(this.committed), this.now);
      const result = await work(tx);
      if (tx.dirty) {
        assertUniqueOrders(tx.board, tx.touched);
        tx.board.revision++;
        await this.save(tx.board);
        this.committed = tx.board;
      }
      return result;
    } finally {
      release();
    }
  }

  async close(): Promise<void> {
    this.committed = undefined;
  }
}

function assertUniqueOrders(board: BoardFile, touched: Set<string>): void {
  const violations = [
    ...findOrderViolations(board.columns, () => COLUMN_SET_KEY),
    ...findOrderViolations(board.tasks, (t) => taskSetKey(t.columnId))
  ].filter((v) => v.kind === 'duplicate' && touched.has(v.container));

  const first = violations[0];
  if (first) {
    throw new ConstraintViolationError(first.container, `order ${first.order} is used more than once`);
  }
}

class JsonOrderedSet implements OrderedSet {
  constructor(
    readonly key: string,
    private readonly members: () => Array<{ order: number }>,
    private readonly tx: JsonTransaction
  ) {}

  // the database admits one transaction at a time
  async lock(): Promise<void> {}

  async count(): Promise<number> {
    return this.members().length;
  }

  async shift(range: OrderRange, delta: 1 | -1): Promise<void> {
    let shifted = 0;
    for (const member of this.members()) {
      if (member.order >= range.from && (range.to === undefined || member.order <= range.to)) {
        member.order += delta;
        shifted++;
      }
    }
    if (shifted > 0) this.tx.markWritten(this.key);
  }
}

class JsonTransaction implements BoardTransaction {
  readonly touched = new Set<string>();
  dirty = false;
  readonly columns: ColumnTable;
  readonly tasks: TaskTable;
  readonly users: UserTable;
  readonly todos: TodoTable;

  constructor(readonly board: BoardFile, private readonly now: () => string) {
    this.columns = new JsonColumnTable(this);
    this.tasks = new JsonTaskTable(this);
    this.users = new JsonUserTable(this);
    this.todos = new JsonTodoTable(this);
  }

  markWritten(...containers: string[]): void {
    this.dirty = true;
    for (const key of containers) this.touched.add(key);
  }

  nextId(table: keyof BoardFile['sequences']): number {
    this.board.sequences[table] += 1;
    return this.board.sequences[table];
  }

  timestamp(): string {
    return this.now();
  }
}

class JsonColumnTable implements ColumnTable {
  readonly positions: OrderedSet;

  constructor(private readonly tx: JsonTransaction) {
    this.positions = new JsonOrderedSet(COLUMN_SET_KEY, () => tx.board.columns, tx);
  }

  async find(id: number): Promise<Column | undefined> {
    const column = this.tx.board.columns.find((c) => c.id === id);
    return column ? { ...column } : undefined;
  }

  async list(): Promise<Column[]> {
    return [...this.tx.board.columns].sort(byOrder).map((c) => ({ ...c }));
  }

  async insert(values: NewColumn): Promise<Column> {
    const column: Column = {
      id: this.tx.nextId('columns'),
      title: values.title,
      order: values.order,
      createdAt: this.tx.timestamp()
    };
    this.tx.board.columns.push(column);
    this.tx.markWritten(COLUMN_SET_KEY);
    return { ...column };
  }

  async update(id: number, values: ColumnValues): Promise<Column | undefined> {
    const column = this.tx.board.columns.find((c) => c.id === id);
    if (!column) return undefined;
    if (values.title !== undefined) column.title = values.title;
    if (values.order !== undefined) column.order = values.order;
    this.tx.markWritten(COLUMN_SET_KEY);
    return { ...column };
  }

  async delete(id: number): Promise<Column | undefined> {
    const idx = this.tx.board.columns.findIndex((c) => c.id === id);
    if (idx < 0) return undefined;
    const [removed] = this.tx.board.columns.splice(idx, 1);
    this.tx.markWritten(COLUMN_SET_KEY);
    return removed ? { ...removed } : undefined;
  }
}

class JsonTaskTable implements TaskTable {
  constructor(private readonly tx: JsonTransaction) {}

  positions(columnId: number): OrderedSet {
    return new JsonOrderedSet(taskSetKey(columnId), () => this.tx.board.tasks.filter((t) => t.columnId === columnId), this.tx);
  }

  async find(id: number): Promise<Task | undefined> {
    const task = this.tx.board.tasks.find((t) => t.id === id);
    return task ? { ...task } : undefined;
  }

  async list(): Promise<Task[]> {
    return [...this.tx.board.tasks]
      .sort((a, b) => (a.columnId - b.columnId) || byOrder(a, b))
      .map((t) => ({ ...t }));
  }

  async listByColumn(columnId: number): Promise<Task[]> {
    return this.tx.board.tasks
      .filter((t) => t.columnId === columnId)
      .sort(byOrder)
      .map((t) => ({ ...t }));
  }

  async insert(values: NewTask): Promise<Task> {
    const task: Task = {
      id: this.tx.nextId('tasks'),
      title: values.title,
      ...(values.description !== undefined ? { description: values.description } : {}),
      columnId: values.columnId,
      order: values.order,
      createdAt: this.tx.timestamp()
    };
    this.tx.board.tasks.push(task);
    this.tx.markWritten(taskSetKey(task.columnId));
    return { ...task };
  }

  async update(id: number, values: TaskValues): Promise<Task | undefined> {
    const task = this.tx.board.tasks.find((t) => t.id === id);
    if (!task) return undefined;
    const previousColumn = task.columnId;
    if (values.title !== undefined) task.title = values.title;
    if (values.description === null) delete task.description;
    else if (values.description !== undefined) task.description = values.description;
    if (values.columnId !== undefined) task.columnId = values.columnId;
    if (values.order !== undefined) task.order = values.order;
    this.tx.markWritten(taskSetKey(previousColumn), taskSetKey(task.columnId));
    return { ...task };
  }

  async delete(id: number): Promise<Task | undefined> {
    const idx = this.tx.board.tasks.findIndex((t) => t.id === id);
    if (idx < 0) return undefined;
    const [removed] = this.tx.board.tasks.splice(idx, 1);
    if (!removed) return undefined;
    this.tx.markWritten(taskSetKey(removed.columnId));
    return { ...removed };
  }

  async deleteByColumn(columnId: number): Promise<number> {
    const before = this.tx.board.tasks.length;
    this.tx.board.tasks = this.tx.board.tasks.filter((t) => t.columnId !== columnId);
    const removed = before - this.tx.board.tasks.length;
    if (removed > 0) this.tx.markWritten(taskSetKey(columnId));
    return removed;
  }
}

class JsonUserTable implements UserTable {
  constructor(private readonly tx: JsonTransaction) {}

  async find(id: number): Promise<User | undefined> {
    const user = this.tx.board.users.find((u) => u.id === id);
    return user ? { ...user } : undefined;
  }

  async findByEmail(email: string): Promise<User | undefined> {
    const user = this.tx.board.users.find((u) => u.email === email);
    return user ? { ...user } : undefined;
  }

  async list(): Promise<User[]> {
    return [...this.tx.board.users].sort(byNewest).map((u) => ({ ...u }));
  }

  async insert(values: NewUser): Promise<User> {
    const user: User = {
      id: this.tx.nextId('users'),
      name: values.name,
      email: values.email,
      ...(values.avatarUrl !== undefined ? { avatarUrl: values.avatarUrl } : {}),
      createdAt: this.tx.timestamp()
    };
    this.tx.board.users.push(user);
    this.tx.markWritten();
    return { ...user };
  }

  async update(id: number, values: UserValues): Promise<User | undefined> {
    const user = this.tx.board.users.find((u) => u.id === id);
    if (!user) return undefined;
    if (values.name !== undefined) user.name = values.name;
    if (values.email !== undefined) user.email = values.email;
    if (values.avatarUrl === null) delete user.avatarUrl;
    else if (values.avatarUrl !== undefined) user.avatarUrl = values.avatarUrl;
    this.tx.markWritten();
    return { ...user };
  }

  async delete(id: number): Promise<User | undefined> {
    const idx = this.tx.board.users.findIndex((u) => u.id === id);
    if (idx < 0) return undefined;
    const [removed] = this.tx.board.users.splice(idx, 1);
    this.tx.markWritten();
    return removed ? { ...removed } : undefined;
  }
}

class JsonTodoTable implements TodoTable {
  constructor(private readonly tx: JsonTransaction) {}

  async find(id: number): Promise<Todo | undefined> {
    const todo = this.tx.board.todos.find((t) => t.id === id);
    return todo ? { ...todo } : undefined;
  }

  async list(): Promise<Todo[]> {
    return [...this.tx.board.todos].sort(byNewest).map((t) => ({ ...t }));
  }

  async insert(values: NewTodo): Promise<Todo> {
    const now = this.tx.timestamp();
    const todo: Todo = {
      id: this.tx.nextId('todos'),
      title: values.title,
      ...(values.description !== undefined ? { description: values.description } : {}),
      completed: values.completed,
      createdAt: now,
      updatedAt: now
    };
    this.tx.board.todos.push(todo);
    this.tx.markWritten();
    return { ...todo };
  }

  async update(id: number, values: TodoValues): Promise<Todo | undefined> {
    const todo = this.tx.board.todos.find((t) => t.id === id);
    if (!todo) return undefined;
    if (values.title !== undefined) todo.title = values.title;
    if (values.description === null) delete todo.description;
    else if (values.description !== undefined) todo.description = values.description;
    if (values.completed !== undefined) todo.completed = values.completed;
    todo.updatedAt = this.tx.timestamp();
    this.tx.markWritten();
    return { ...todo };
  }

  async delete(id: number): Promise<Todo | undefined> {
    const idx = this.tx.board.todos.findIndex((t) => t.id === id);
    if (idx < 0) return undefined;
    const [removed] = this.tx.board.todos.splice(idx, 1);
    this.tx.markWritten();
    return removed ? { ...removed } : undefined;
  }
}
