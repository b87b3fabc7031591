import { asc, count, desc, eq, sql, type AnyColumn, type SQL } from 'drizzle-orm';
import type { PgTransactionConfig } from 'drizzle-orm/pg-core';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import type { OrderRange, OrderedSet } from '../positionLedger.js';
import type { Column, Task, Todo, User } from '../types.js';
import * as schema from './pgSchema.js';
import { columns, tasks, todos, users, type DbColumn, type DbTask, type DbTodo, type DbUser } from './pgSchema.js';
import { translateError } from './pgErrors.js';
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

type Db = PostgresJsDatabase<typeof schema>;
type Tx = Parameters<Parameters<Db['transaction']>[0]>[0];

// advisory lock namespaces (pg_advisory_xact_lock(int, int))
const COLUMN_SET_LOCK = 1;
const TASK_SET_LOCK = 2;

export type PostgresDatabaseOptions = {
  url: string;
  poolMax: number;
  acquireTimeoutMs: number;
  connectTimeoutSec: number;
};

function toColumn(row: DbColumn): Column {
  return { id: row.id, title: row.title, order: row.order, createdAt: row.createdAt.toISOString() };
}

function toTask(row: DbTask): Task {
  return {
    id: row.id,
    title: row.title,
    ...(row.description !== null ? { description: row.description } : {}),
    columnId: row.columnId,
    order: row.order,
    createdAt: row.createdAt.toISOString()
  };
}

function toUser(row: DbUser): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    ...(row.avatarUrl !== null ? { avatarUrl: row.avatarUrl } : {}),
    createdAt: row.createdAt.toISOString()
  };
}

function toTodo(row: DbTodo): Todo {
  return {
    id: row.id,
    title: row.title,
    ...(row.description !== null ? { description: row.description } : {}),
    completed: row.completed,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString()
  };
}

function isEmpty(values: Record<string, unknown>): boolean {
  return Object.values(values).every((v) => v === undefined);
}

function inRange(order: AnyColumn, range: OrderRange): SQL {
  return range.to === undefined
    ? sql`${order} >= ${range.from}`
    : sql`${order} between ${range.from} and ${range.to}`;
}

/** Postgres settings for a transaction; `undefined` keeps the server defaults. */
export function toTransactionConfig(options?: TransactionOptions): PgTransactionConfig | undefined {
  if (options?.consistency !== 'snapshot') return undefined;
  return { isolationLevel: 'repeatable read' };
}

/**
 * Postgres backend. Each transaction takes advisory locks on the containers
 * it shifts, so two sequences on the same container never interleave; the
 * deferred unique constraints catch anything that slips through at commit.
 */
export class PostgresDatabase implements BoardDatabase {
  readonly kind = 'postgres';
  private readonly client: postgres.Sql;
  private readonly db: Db;
  private readonly slots: Semaphore;
  private readonly acquireTimeoutMs: number;

  constructor(options: PostgresDatabaseOptions) {
    this.client = postgres(options.url, {
      max: options.poolMax,
      connect_timeout: options.connectTimeoutSec,
      idle_timeout: 30,
      onnotice: () => {}
    });
    this.db = drizzle(this.client, { schema });
    this.slots = new Semaphore(options.poolMax);
    this.acquireTimeoutMs = options.acquireTimeoutMs;
  }

  async transaction<T>(work: (tx: BoardTransaction) => Promise<T>, options?: TransactionOptions): Promise<T> {
    const release = await this.slots.acquire({ timeoutMs: this.acquireTimeoutMs, signal: options?.signal });
    try {
      return await this.db.transaction((tx) => work(new PgBoardTransaction(tx)), toTransactionConfig(options));
    } catch (error) {
      throw translateError(error);
    } finally {
      release();
    }
  }

  async close(): Promise<void> {
    await this.client.end({ timeout: 5 });
  }
}

class PgOrderedSet implements OrderedSet {
  constructor(
    readonly key: string,
    private readonly tx: Tx,
    private readonly lockKey: readonly [number, number],
    private readonly queries: Pick<OrderedSet, 'count' | 'shift'>
  ) {}

  async lock(): Promise<void> {
    await this.tx.execute(sql`select pg_advisory_xact_lock(${this.lockKey[0]}::int, ${this.lockKey[1]}::int)`);
  }

  count(): Promise<number> {
    return this.queries.count();
  }

  shift(range: OrderRange, delta: 1 | -1): Promise<void> {
    return this.queries.shift(range, delta);
  }
}

class PgBoardTransaction implements BoardTransaction {
  readonly columns: ColumnTable;
  readonly tasks: TaskTable;
  readonly users: UserTable;
  readonly todos: TodoTable;

  constructor(tx: Tx) {
    this.columns = new PgColumnTable(tx);
    this.tasks = new PgTaskTable(tx);
    this.users = new PgUserTable(tx);
    this.todos = new PgTodoTable(tx);
  }
}

class PgColumnTable implements ColumnTable {
  readonly positions: OrderedSet;

  constructor(private readonly tx: Tx) {
    this.positions = new PgOrderedSet(COLUMN_SET_KEY, tx, [COLUMN_SET_LOCK, 0], {
      count: async () => {
        const [row] = await tx.select({ value: count() }).from(columns);
        return row?.value ?? 0;
      },
      shift: async (range, delta) => {
        await tx
          .update(columns)
          .set({ order: sql`${columns.order} + ${delta}` })
          .where(inRange(columns.order, range));
      }
    });
  }

  async find(id: number): Promise<Column | undefined> {
    const [row] = await this.tx.select().from(columns).where(eq(columns.id, id));
    return row ? toColumn(row) : undefined;
  }

  async list(): Promise<Column[]> {
    const rows = await this.tx.select().from(columns).orderBy(asc(columns.order));
    return rows.map(toColumn);
  }

  async insert(values: NewColumn): Promise<Column> {
    const [row] = await this.tx.insert(columns).values(values).returning();
    if (!row) throw new Error('Column insert returned no row');
    return toColumn(row);
  }

  async update(id: number, values: ColumnValues): Promise<Column | undefined> {
    if (isEmpty(values)) return this.find(id);
    const [row] = await this.tx.update(columns).set(values).where(eq(columns.id, id)).returning();
    return row ? toColumn(row) : undefined;
  }

  async delete(id: number): Promise<Column | undefined> {
    const [row] = await this.tx.delete(columns).where(eq(columns.id, id)).returning();
    return row ? toColumn(row) : undefined;
  }
}

class PgTaskTable implements TaskTable {
  constructor(private readonly tx: Tx) {}

  positions(columnId: number): OrderedSet {
    const tx = this.tx;
    return new PgOrderedSet(taskSetKey(columnId), tx, [TASK_SET_LOCK, columnId], {
      count: async () => {
        const [row] = await tx.select({ value: count() }).from(tasks).where(eq(tasks.columnId, columnId));
        return row?.value ?? 0;
      },
      shift: async (range, delta) => {
        await tx
          .update(tasks)
          .set({ order: sql`${tasks.order} + ${delta}` })
          .where(sql`${tasks.columnId} = ${columnId} and ${inRange(tasks.order, range)}`);
      }
    });
  }

  async find(id: number): Promise<Task | undefined> {
    const [row] = await this.tx.select().from(tasks).where(eq(tasks.id, id));
    return row ? toTask(row) : undefined;
  }

  async list(): Promise<Task[]> {
    const rows = await this.tx.select().from(tasks).orderBy(asc(tasks.columnId), asc(tasks.order));
    return rows.map(toTask);
  }

  async listByColumn(columnId: number): Promise<Task[]> {
    const rows = await this.tx.select().from(tasks).where(eq(tasks.columnId, columnId)).orderBy(asc(tasks.order));
    return rows.map(toTask);
  }

  async insert(values: NewTask): Promise<Task> {
    const [row] = await this.tx
      .insert(tasks)
      .values({ ...values, description: values.description ?? null })
      .returning();
    if (!row) throw new Error('Task insert returned no row');
    return toTask(row);
  }

  async update(id: number, values: TaskValues): Promise<Task | undefined> {
    if (isEmpty(values)) return this.find(id);
    const [row] = await this.tx.update(tasks).set(values).where(eq(tasks.id, id)).returning();
    return row ? toTask(row) : undefined;
  }

  async delete(id: number): Promise<Task | undefined> {
    const [row] = await this.tx.delete(tasks).where(eq(tasks.id, id)).returning();
    return row ? toTask(row) : undefined;
  }

  async deleteByColumn(columnId: number): Promise<number> {
    const rows = await this.tx.delete(tasks).where(eq(tasks.columnId, columnId)).returning({ id: tasks.id });
    return rows.length;
  }
}

class PgUserTable implements UserTable {
  constructor(private readonly tx: Tx) {}

  async find(id: number): Promise<User | undefined> {
    const [row] = await this.tx.select().from(users).where(eq(users.id, id));
    return row ? toUser(row) : undefined;
  }

  async findByEmail(email: string): Promise<User | undefined> {
    const [row] = await this.tx.select().from(users).where(eq(users.email, email));
    return row ? toUser(row) : undefined;
  }

  async list(): Promise<User[]> {
    const rows = await this.tx.select().from(users).orderBy(desc(users.createdAt), desc(users.id));
    return rows.map(toUser);
  }

  async insert(values: NewUser): Promise<User> {
    const [row] = await this.tx
      .insert(users)
      .values({ ...values, avatarUrl: values.avatarUrl ?? null })
      .returning();
    if (!row) throw new Error('User insert returned no row');
    return toUser(row);
  }

  async update(id: number, values: UserValues): Promise<User | undefined> {
    if (isEmpty(values)) return this.find(id);
    const [row] = await this.tx.update(users).set(values).where(eq(users.id, id)).returning();
    return row ? toUser(row) : undefined;
  }

  async delete(id: number): Promise<User | undefined> {
    const [row] = await this.tx.delete(users).where(eq(users.id, id)).returning();
    return row ? toUser(row) : undefined;
  }
}

class PgTodoTable implements TodoTable {
  constructor(private readonly tx: Tx) {}

  async find(id: number): Promise<Todo | undefined> {
    const [row] = await this.tx.select().from(todos).where(eq(todos.id, id));
    return row ? toTodo(row) : undefined;
  }

  async list(): Promise<Todo[]> {
    const rows = await this.tx.select().from(todos).orderBy(desc(todos.createdAt), desc(todos.id));
    return rows.map(toTodo);
  }

  async insert(values: NewTodo): Promise<Todo> {
    const [row] = await this.tx
      .insert(todos)
      .values({ ...values, description: values.description ?? null })
      .returning();
    if (!row) throw new Error('Todo insert returned no row');
    return toTodo(row);
  }

  async update(id: number, values: TodoValues): Promise<Todo | undefined> {
    const [row] = await this.tx
      .update(todos)
      .set({ ...values, updatedAt: sql`now()` })
      .where(eq(todos.id, id))
      .returning();
    return row ? toTodo(row) : undefined;
  }

  async delete(id: number): Promise<Todo | undefined> {
    const [row] = await this.tx.delete(todos).where(eq(todos.id, id)).returning();
    return row ? toTodo(row) : undefined;
  }
}
