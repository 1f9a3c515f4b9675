/**
 * @fnhost/worker-core - language worker console output
 *
 * @packageDocumentation
 */

export type { ConsoleLog } from './types.js';
export { WorkerConsoleLogSource, isAbortError } from './console-log-source.js';
export { WorkerConsoleLogService } from './console-log-service.js';
