/**
 * fnhost kernel constants
 *
 * Names shared by every package: log categories, attribute keys,
 * configuration section names and environment setting names.
 */

export const HOST_VERSION = '0.3.0';

/**
 * Host-wide script constants
 */
export const SCRIPT_CONSTANTS = {
  /** Log category used by the secret manager */
  LOG_CATEGORY_KEYS: 'Host.Keys',
  /** Log category for worker console output piped back to the host */
  CONSOLE_LOG_CATEGORY: 'Host.Function.Console',
  /** Prefix of user function log categories (Function.<name>.User) */
  FUNCTION_LOG_CATEGORY_PREFIX: 'Function',
  /** Category of host startup/bootstrap logs */
  LOG_CATEGORY_HOST_GENERAL: 'Host.General',

  LOG_PROPERTY_HOST_INSTANCE_ID: 'HostInstanceId',
  LOG_PROPERTY_PROCESS_ID: 'ProcessId',
  LOG_PROPERTY_EVENT_NAME: 'EventName',
  LOG_PROPERTY_FUNCTION_NAME: 'FunctionName',

  DEFAULT_MASTER_KEY_NAME: 'master',
  DEFAULT_FUNCTION_KEY_NAME: 'default',
  MAX_SECRET_BACKUP_COUNT: 10,

  /** Resource attribute prefix identifying telemetry produced by this host */
  HOST_SDK_PREFIX: 'fnhost',
} as const;

/**
 * Key scopes of host level secrets
 */
export const HOST_KEY_SCOPES = {
  FUNCTION_KEYS: 'functionkeys',
  SYSTEM_KEYS: 'systemkeys',
} as const;

export type HostKeyScope = (typeof HOST_KEY_SCOPES)[keyof typeof HOST_KEY_SCOPES];

/**
 * Environment/application setting names read by the host
 */
export const ENVIRONMENT_SETTING_NAMES = {
  OTEL_SDK_DISABLED: 'OTEL_SDK_DISABLED',
  APPINSIGHTS_INSTRUMENTATION_KEY: 'APPINSIGHTS_INSTRUMENTATIONKEY',
  APPINSIGHTS_CONNECTION_STRING: 'APPLICATIONINSIGHTS_CONNECTION_STRING',
  PLACEHOLDER_MODE: 'WEBSITE_PLACEHOLDER_MODE',
  WEBSITE_HOSTNAME: 'WEBSITE_HOSTNAME',
  AUTH_ENCRYPTION_KEY: 'WEBSITE_AUTH_ENCRYPTION_KEY',
  PREVIOUS_ENCRYPTION_KEYS: 'FUNCTIONS_PREVIOUS_ENCRYPTION_KEYS',
  SECRET_STORAGE_TYPE: 'AzureWebJobsSecretStorageType',
  SECRETS_PATH: 'FUNCTIONS_SECRETS_PATH',
  LOG_LEVEL: 'LOG_LEVEL',
} as const;

/**
 * Configuration section names (host.json layout)
 */
export const CONFIGURATION_SECTION_NAMES = {
  JOB_HOST: 'AzureFunctionsJobHost',
  LOGGING: 'logging',
  TELEMETRY_MODE: 'telemetryMode',
  APPLICATION_INSIGHTS: 'applicationInsights',
} as const;
