import { ConflictError, NotFoundError } from '../errors.js';
import type { BoardDatabase, TransactionOptions } from '../db/types.js';
import type { User, UserInput, UserPatch } from '../types.js';

export interface UserRepository {
  create(input: UserInput, options?: TransactionOptions): Promise<User>;
  get(id: number, options?: TransactionOptions): Promise<User>;
  list(options?: TransactionOptions): Promise<User[]>;
  update(id: number, patch: UserPatch, options?: TransactionOptions): Promise<User>;
  delete(id: number, options?: TransactionOptions): Promise<User>;
}

function emailTaken(email: string): ConflictError {
  return new ConflictError(`User with email ${email} already exists`);
}

export class UserStore implements UserRepository {
  constructor(private readonly db: BoardDatabase) {}

  create(input: UserInput, options?: TransactionOptions): Promise<User> {
    return this.db.transaction(async (tx) => {
      if (await tx.users.findByEmail(input.email)) throw emailTaken(input.email);
      return tx.users.insert({ name: input.name, email: input.email, avatarUrl: input.avatarUrl });
    }, options);
  }

  get(id: number, options?: TransactionOptions): Promise<User> {
    return this.db.transaction(async (tx) => {
      const user = await tx.users.find(id);
      if (!user) throw new NotFoundError('user', id);
      return user;
    }, options);
  }

  list(options?: TransactionOptions): Promise<User[]> {
    return this.db.transaction((tx) => tx.users.list(), options);
  }

  update(id: number, patch: UserPatch, options?: TransactionOptions): Promise<User> {
    return this.db.transaction(async (tx) => {
      if (patch.email !== undefined) {
        const owner = await tx.users.findByEmail(patch.email);
        if (owner && owner.id !== id) throw emailTaken(patch.email);
      }
      const user = await tx.users.update(id, patch);
      if (!user) throw new NotFoundError('user', id);
      return user;
    }, options);
  }

  delete(id: number, options?: TransactionOptions): Promise<User> {
    return this.db.transaction(async (tx) => {
      const user = await tx.users.delete(id);
      if (!user) throw new NotFoundError('user', id);
      return user;
    }, options);
  }
}
