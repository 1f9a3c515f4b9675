/**
 * fnhost kernel
 * Shared constants and errors for the functions host
 *
 * @packageDocumentation
 */

export type { ErrorDefinition, Disposable } from './types.js';

export {
  HOST_VERSION,
  SCRIPT_CONSTANTS,
  HOST_KEY_SCOPES,
  ENVIRONMENT_SETTING_NAMES,
  CONFIGURATION_SECTION_NAMES,
  type HostKeyScope,
} from './constants.js';

export {
  ERROR_CODES,
  ERRORS,
  HostError,
  CryptographicError,
  requireArgument,
  type ErrorCode,
} from './errors.js';
