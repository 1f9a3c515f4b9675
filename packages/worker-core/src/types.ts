/**
 * Worker console log types
 */

import type { LogLevel } from '@fnhost/logging';

/**
 * A line a language worker wrote to its console
 */
export interface ConsoleLog {
  level: LogLevel;
  message: string;
}
