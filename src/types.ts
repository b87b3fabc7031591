export type Column = {
  id: number;
  title: string;
  order: number;
  createdAt: string;
};

export type Task = {
  id: number;
  title: string;
  description?: string;
  columnId: number;
  order: number;
  createdAt: string;
};

export type User = {
  id: number;
  name: string;
  email: string;
  avatarUrl?: string;
  createdAt: string;
};

export type Todo = {
  id: number;
  title: string;
  description?: string;
  completed: boolean;
  createdAt: string;
  updatedAt: string;
};

export type ColumnInput = {
  title: string;
  order?: number;
};

export type ColumnPatch = {
  title?: string;
  order?: number;
};

export type TaskInput = {
  title: string;
  description?: string;
  columnId: number;
  order?: number;
};

// description: null clears it
export type TaskPatch = {
  title?: string;
  description?: string | null;
  order?: number;
};

export type UserInput = {
  name: string;
  email: string;
  avatarUrl?: string;
};

export type UserPatch = {
  name?: string;
  email?: string;
  avatarUrl?: string | null;
};

export type TodoInput = {
  title: string;
  description?: string;
  completed?: boolean;
};

export type TodoPatch = {
  title?: string;
  description?: string | null;
  completed?: boolean;
};

export type BoardSnapshot = {
  columns: Array<Column & { tasks: Task[] }>;
};
