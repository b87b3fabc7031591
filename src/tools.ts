import { z } from 'zod';
import type { BoardStore } from './boardStore.js';
import { BoardError } from './errors.js';
import { silentLogger, type Logger } from './log.js';
import {
  CreateColumnInputSchema,
  CreateTaskInputSchema,
  CreateTodoInputSchema,
  CreateUserInputSchema,
  IdInputSchema,
  ListTasksInputSchema,
  MoveTaskInputSchema,
  ReorderInputSchema,
  UpdateColumnInputSchema,
  UpdateTaskInputSchema,
  UpdateTodoInputSchema,
  UpdateUserInputSchema
} from './schema.js';

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, object>;
    required?: string[];
    additionalProperties: false;
  };
};

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export type ToolContext = {
  signal?: AbortSignal;
  logger?: Logger;
};

const id = { type: 'integer', minimum: 1 };
const order = { type: 'integer', minimum: 0 };
const title = { type: 'string', minLength: 1, maxLength: 200 };

function objectSchema(properties: Record<string, object>, required: string[] = []): ToolDefinition['inputSchema'] {
  return {
    type: 'object',
    properties,
    ...(required.length > 0 ? { required } : {}),
    additionalProperties: false
  };
}

export const TOOLS: ToolDefinition[] = [
  {
    name: 'board_get',
    description: 'Get the board: columns in order, each with its tasks in order',
    inputSchema: objectSchema({})
  },
  {
    name: 'board_verify',
    description: 'Report gaps or duplicate orders in any column or task list (read-only)',
    inputSchema: objectSchema({})
  },
  {
    name: 'columns_list',
    description: 'List columns ordered by position',
    inputSchema: objectSchema({})
  },
  {
    name: 'column_get',
    description: 'Get a column by id',
    inputSchema: objectSchema({ id }, ['id'])
  },
  {
    name: 'column_create',
    description: 'Create a column (appended unless order is given)',
    inputSchema: objectSchema({ title, order }, ['title'])
  },
  {
    name: 'column_update',
    description: 'Update a column (partial patch; an order change repositions it)',
    inputSchema: objectSchema(
      { id, patch: { type: 'object', properties: { title, order }, additionalProperties: false } },
      ['id', 'patch']
    )
  },
  {
    name: 'column_delete',
    description: 'Delete a column and every task in it',
    inputSchema: objectSchema({ id }, ['id'])
  },
  {
    name: 'column_reorder',
    description: 'Move a column to a new position',
    inputSchema: objectSchema({ id, order }, ['id', 'order'])
  },
  {
    name: 'tasks_list',
    description: 'List tasks ordered by column then position (optionally one column)',
    inputSchema: objectSchema({ columnId: id })
  },
  {
    name: 'task_get',
    description: 'Get a task by id',
    inputSchema: objectSchema({ id }, ['id'])
  },
  {
    name: 'task_create',
    description: 'Create a task in a column (appended unless order is given)',
    inputSchema: objectSchema(
      { title, description: { type: 'string', maxLength: 2000 }, columnId: id, order },
      ['title', 'columnId']
    )
  },
  {
    name: 'task_update',
    description: 'Update a task (partial patch; an order change repositions it, description null clears it)',
    inputSchema: objectSchema(
      {
        id,
        patch: {
          type: 'object',
          properties: { title, description: { type: ['string', 'null'], maxLength: 2000 }, order },
          additionalProperties: false
        }
      },
      ['id', 'patch']
    )
  },
  {
    name: 'task_delete',
    description: 'Delete a task',
    inputSchema: objectSchema({ id }, ['id'])
  },
  {
    name: 'task_reorder',
    description: 'Move a task to a new position within its column',
    inputSchema: objectSchema({ id, order }, ['id', 'order'])
  },
  {
    name: 'task_move',
    description: 'Move a task to another column (appended unless order is given)',
    inputSchema: objectSchema({ id, columnId: id, order }, ['id', 'columnId'])
  },
  {
    name: 'users_list',
    description: 'List users, newest first',
    inputSchema: objectSchema({})
  },
  {
    name: 'user_get',
    description: 'Get a user by id',
    inputSchema: objectSchema({ id }, ['id'])
  },
  {
    name: 'user_create',
    description: 'Create a user (email must be unique)',
    inputSchema: objectSchema(
      { name: title, email: { type: 'string', format: 'email' }, avatarUrl: { type: 'string', maxLength: 500 } },
      ['name', 'email']
    )
  },
  {
    name: 'user_update',
    description: 'Update a user (partial patch)',
    inputSchema: objectSchema(
      {
        id,
        patch: {
          type: 'object',
          properties: {
            name: title,
            email: { type: 'string', format: 'email' },
            avatarUrl: { type: ['string', 'null'], maxLength: 500 }
          },
          additionalProperties: false
        }
      },
      ['id', 'patch']
    )
  },
  {
    name: 'user_delete',
    description: 'Delete a user',
    inputSchema: objectSchema({ id }, ['id'])
  },
  {
    name: 'todos_list',
    description: 'List todos, newest first',
    inputSchema: objectSchema({})
  },
  {
    name: 'todo_get',
    description: 'Get a todo by id',
    inputSchema: objectSchema({ id }, ['id'])
  },
  {
    name: 'todo_create',
    description: 'Create a todo',
    inputSchema: objectSchema(
      { title, description: { type: 'string', maxLength: 1000 }, completed: { type: 'boolean' } },
      ['title']
    )
  },
  {
    name: 'todo_update',
    description: 'Update a todo (partial patch)',
    inputSchema: objectSchema(
      {
        id,
        patch: {
          type: 'object',
          properties: {
            title,
            description: { type: ['string', 'null'], maxLength: 1000 },
            completed: { type: 'boolean' }
          },
          additionalProperties: false
        }
      },
      ['id', 'patch']
    )
  },
  {
    name: 'todo_delete',
    description: 'Delete a todo',
    inputSchema: objectSchema({ id }, ['id'])
  },
  {
    name: 'todo_complete',
    description: 'Mark a todo as completed',
    inputSchema: objectSchema({ id }, ['id'])
  },
  {
    name: 'todo_incomplete',
    description: 'Mark a todo as not completed',
    inputSchema: objectSchema({ id }, ['id'])
  }
];

export function toolResultText(text: string, isError = false): ToolResult {
  return { content: [{ type: 'text', text }], ...(isError ? { isError: true } : {}) };
}

export function toolResultJson(obj: unknown): ToolResult {
  return toolResultText(JSON.stringify(obj, null, 2));
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(input)'}: ${i.message}`).join('; ');
}

/**
 * Known failures become `isError` results prefixed with their kind; anything
 * else (a lost connection, a bug) is rethrown to the transport.
 */
export function toolResultError(error: unknown): ToolResult {
  if (error instanceof z.ZodError) return toolResultText(`invalid_input: ${formatIssues(error)}`, true);
  if (error instanceof BoardError) return toolResultText(`${error.kind}: ${error.message}`, true);
  throw error;
}

async function dispatch(board: BoardStore, name: string, args: unknown, signal?: AbortSignal): Promise<ToolResult> {
  const options = { signal };

  switch (name) {
    case 'board_get':
      return toolResultJson(await board.snapshot(options));

    case 'board_verify': {
      const violations = await board.verify(options);
      return toolResultJson({ ok: violations.length === 0, violations });
    }

    case 'columns_list':
      return toolResultJson(await board.columns.list(options));

    case 'column_get': {
      const input = IdInputSchema.parse(args);
      return toolResultJson(await board.columns.get(input.id, options));
    }

    case 'column_create': {
      const input = CreateColumnInputSchema.parse(args);
      return toolResultJson(await board.columns.create(input, options));
    }

    case 'column_update': {
      const input = UpdateColumnInputSchema.parse(args);
      return toolResultJson(await board.columns.update(input.id, input.patch, options));
    }

    case 'column_delete': {
      const input = IdInputSchema.parse(args);
      return toolResultJson(await board.columns.delete(input.id, options));
    }

    case 'column_reorder': {
      const input = ReorderInputSchema.parse(args);
      return toolResultJson(await board.columns.reorder(input.id, input.order, options));
    }

    case 'tasks_list': {
      const input = ListTasksInputSchema.parse(args);
      const tasks = input.columnId !== undefined
        ? await board.tasks.listByColumn(input.columnId, options)
        : await board.tasks.list(options);
      return toolResultJson(tasks);
    }

    case 'task_get': {
      const input = IdInputSchema.parse(args);
      return toolResultJson(await board.tasks.get(input.id, options));
    }

    case 'task_create': {
      const input = CreateTaskInputSchema.parse(args);
      return toolResultJson(await board.tasks.create(input, options));
    }

    case 'task_update': {
      const input = UpdateTaskInputSchema.parse(args);
      return toolResultJson(await board.tasks.update(input.id, input.patch, options));
    }

    case 'task_delete': {
      const input = IdInputSchema.parse(args);
      return toolResultJson(await board.tasks.delete(input.id, options));
    }

    case 'task_reorder': {
      const input = ReorderInputSchema.parse(args);
      return toolResultJson(await board.tasks.reorder(input.id, input.order, options));
    }

    case 'task_move': {
      const input = MoveTaskInputSchema.parse(args);
      return toolResultJson(await board.tasks.move(input.id, input.columnId, input.order, options));
    }

    case 'users_list':
      return toolResultJson(await board.users.list(options));

    case 'user_get': {
      const input = IdInputSchema.parse(args);
      return toolResultJson(await board.users.get(input.id, options));
    }

    case 'user_create': {
      const input = CreateUserInputSchema.parse(args);
      return toolResultJson(await board.users.create(input, options));
    }

    case 'user_update': {
      const input = UpdateUserInputSchema.parse(args);
      return toolResultJson(await board.users.update(input.id, input.patch, options));
    }

    case 'user_delete': {
      const input = IdInputSchema.parse(args);
      return toolResultJson(await board.users.delete(input.id, options));
    }

    case 'todos_list':
      return toolResultJson(await board.todos.list(options));

    case 'todo_get': {
      const input = IdInputSchema.parse(args);
      return toolResultJson(await board.todos.get(input.id, options));
    }

    case 'todo_create': {
      const input = CreateTodoInputSchema.parse(args);
      return toolResultJson(await board.todos.create(input, options));
    }

    case 'todo_update': {
      const input = UpdateTodoInputSchema.parse(args);
      return toolResultJson(await board.todos.update(input.id, input.patch, options));
    }

    case 'todo_delete': {
      const input = IdInputSchema.parse(args);
      return toolResultJson(await board.todos.delete(input.id, options));
    }

    case 'todo_complete': {
      const input = IdInputSchema.parse(args);
      return toolResultJson(await board.todos.setCompleted(input.id, true, options));
    }

    case 'todo_incomplete': {
      const input = IdInputSchema.parse(args);
      return toolResultJson(await board.todos.setCompleted(input.id, false, options));
    }

    default:
      return toolResultText(`Unknown tool: ${name}`, true);
  }
}

export async function callTool(board: BoardStore, name: string, args: unknown, context: ToolContext = {}): Promise<ToolResult> {
  const logger = context.logger ?? silentLogger;
  try {
    return await dispatch(board, name, args, context.signal);
  } catch (error) {
    if (error instanceof z.ZodError || error instanceof BoardError) {
      const result = toolResultError(error);
      logger.warn(`tool ${name} rejected`, { error: result.content[0]?.text });
      return result;
    }
    logger.error(`tool ${name} failed`, { error: error instanceof Error ? error.message : String(error) });
    throw error;
  }
}
