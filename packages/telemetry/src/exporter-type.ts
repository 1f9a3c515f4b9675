/**
 * @fnhost/telemetry - Exporter signal flags
 */

import { HostError, ERROR_CODES } from '@fnhost/kernel';

export const ExporterType = {
  Logging: 0b0001,
  Metrics: 0b0010,
  Traces: 0b0100,
  All: 0b0111,
} as const;

/**
 * A single ExporterType value or a bitwise combination
 */
export type ExporterFlags = number;

export type FlagAction = readonly [flag: ExporterFlags, action: () => void];

export function hasFlag(value: ExporterFlags, flag: ExporterFlags): boolean {
  return (value & flag) === flag;
}

export function isCompositeFlag(flag: ExporterFlags): boolean {
  return (flag & (flag - 1)) !== 0;
}

/**
 * Run every action whose flag is set in `value`, in the given order.
 *
 * @throws HostError E_FLAGS_COMPOSITE when an action is keyed by a composite flag
 */
export function runMatch(value: ExporterFlags, ...actions: readonly FlagAction[]): void {
  for (const [flag, action] of actions) {
    if (isCompositeFlag(flag)) {
      throw new HostError(
        ERROR_CODES.E_FLAGS_COMPOSITE,
        `The value for an action has a composite flag value '${flag}' which is not supported.`
      );
    }
    if (hasFlag(value, flag)) {
      action();
    }
  }
}
