import { z } from 'zod';

const Id = z.number().int().positive();
const Order = z.number().int().min(0);
const Title = z.string().trim().min(1).max(200);
const Description = z.string().max(2000);

export const ColumnSchema = z.object({
  id: Id,
  title: z.string().min(1),
  order: Order,
  createdAt: z.string().min(1)
});

export const TaskSchema = z.object({
  id: Id,
  title: z.string().min(1),
  description: z.string().optional(),
  columnId: Id,
  order: Order,
  createdAt: z.string().min(1)
});

export const UserSchema = z.object({
  id: Id,
  name: z.string().min(1),
  email: z.string().min(1),
  avatarUrl: z.string().optional(),
  createdAt: z.string().min(1)
});

export const TodoSchema = z.object({
  id: Id,
  title: z.string().min(1),
  description: z.string().optional(),
  completed: z.boolean(),
  createdAt: z.string().min(1),
  updatedAt: z.string().min(1)
});

export const BoardFileSchema = z.object({
  version: z.literal(1),
  revision: z.number().int().min(0),
  sequences: z.object({
    columns: z.number().int().min(0),
    tasks: z.number().int().min(0),
    users: z.number().int().min(0),
    todos: z.number().int().min(0)
  }),
  columns: z.array(ColumnSchema),
  tasks: z.array(TaskSchema),
  users: z.array(UserSchema),
  todos: z.array(TodoSchema)
});

export type BoardFile = z.infer<typeof BoardFileSchema>;

export const CreateColumnInputSchema = z.object({
  title: Title,
  order: Order.optional()
});

export const UpdateColumnInputSchema = z.object({
  id: Id,
  patch: z
    .object({
      title: Title.optional(),
      order: Order.optional()
    })
    .strict()
});

export const ReorderInputSchema = z.object({
  id: Id,
  order: Order
});

export const IdInputSchema = z.object({
  id: Id
});

export const CreateTaskInputSchema = z.object({
  title: Title,
  description: Description.optional(),
  columnId: Id,
  order: Order.optional()
});

export const UpdateTaskInputSchema = z.object({
  id: Id,
  patch: z
    .object({
      title: Title.optional(),
      description: Description.nullable().optional(),
      order: Order.optional()
    })
    .strict()
});

export const MoveTaskInputSchema = z.object({
  id: Id,
  columnId: Id,
  order: Order.optional()
});

export const ListTasksInputSchema = z.object({
  columnId: Id.optional()
});

export const CreateUserInputSchema = z.object({
  name: Title,
  email: z.string().trim().email().max(255),
  avatarUrl: z.string().max(500).optional()
});

export const UpdateUserInputSchema = z.object({
  id: Id,
  patch: z
    .object({
      name: Title.optional(),
      email: z.string().trim().email().max(255).optional(),
      avatarUrl: z.string().max(500).nullable().optional()
    })
    .strict()
});

export const CreateTodoInputSchema = z.object({
  title: Title,
  description: z.string().max(1000).optional(),
  completed: z.boolean().default(false)
});

export const UpdateTodoInputSchema = z.object({
  id: Id,
  patch: z
    .object({
      title: Title.optional(),
      description: z.string().max(1000).nullable().optional(),
      completed: z.boolean().optional()
    })
    .strict()
});
