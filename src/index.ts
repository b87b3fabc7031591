export { BoardStore } from './boardStore.js';
export { loadConfig, type AppConfig } from './config.js';
export { openDatabase, JsonDatabase, PostgresDatabase } from './db/index.js';
export type { BoardDatabase, BoardTransaction, TransactionOptions } from './db/types.js';
export * from './errors.js';
export { createLogger, type Logger } from './log.js';
export * from './positionLedger.js';
export { ColumnStore, type ColumnRepository } from './stores/columnStore.js';
export { TaskStore, type TaskRepository } from './stores/taskStore.js';
export { TodoStore, type TodoRepository } from './stores/todoStore.js';
export { UserStore, type UserRepository } from './stores/userStore.js';
export { TOOLS, callTool, type ToolResult } from './tools.js';
export type * from './types.js';
