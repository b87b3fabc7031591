import { NotFoundError } from '../errors.js';
import type { BoardDatabase, TransactionOptions } from '../db/types.js';
import type { Todo, TodoInput, TodoPatch } from '../types.js';

export interface TodoRepository {
  create(input: TodoInput, options?: TransactionOptions): Promise<Todo>;
  get(id: number, options?: TransactionOptions): Promise<Todo>;
  list(options?: TransactionOptions): Promise<Todo[]>;
  update(id: number, patch: TodoPatch, options?: TransactionOptions): Promise<Todo>;
  delete(id: number, options?: TransactionOptions): Promise<Todo>;
  setCompleted(id: number, completed: boolean, options?: TransactionOptions): Promise<Todo>;
}

export class TodoStore implements TodoRepository {
  constructor(private readonly db: BoardDatabase) {}

  create(input: TodoInput, options?: TransactionOptions): Promise<Todo> {
    return this.db.transaction(
      (tx) => tx.todos.insert({ title: input.title, description: input.description, completed: input.completed ?? false }),
      options
    );
  }

  get(id: number, options?: TransactionOptions): Promise<Todo> {
    return this.db.transaction(async (tx) => {
      const todo = await tx.todos.find(id);
      if (!todo) throw new NotFoundError('todo', id);
      return todo;
    }, options);
  }

  list(options?: TransactionOptions): Promise<Todo[]> {
    return this.db.transaction((tx) => tx.todos.list(), options);
  }

  update(id: number, patch: TodoPatch, options?: TransactionOptions): Promise<Todo> {
    return this.db.transaction(async (tx) => {
      const todo = await tx.todos.update(id, patch);
      if (!todo) throw new NotFoundError('todo', id);
      return todo;
    }, options);
  }

  delete(id: number, options?: TransactionOptions): Promise<Todo> {
    return this.db.transaction(async (tx) => {
      const todo = await tx.todos.delete(id);
      if (!todo) throw new NotFoundError('todo', id);
      return todo;
    }, options);
  }

  setCompleted(id: number, completed: boolean, options?: TransactionOptions): Promise<Todo> {
    return this.update(id, { completed }, options);
  }
}
