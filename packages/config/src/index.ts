/**
 * @fnhost/config - layered host configuration
 *
 * @example
 * ```typescript
 * const configuration = new ConfigurationBuilder()
 *   .addJsonFile('host.json', { optional: true, prefix: 'AzureFunctionsJobHost' })
 *   .addEnvironmentVariables()
 *   .build();
 *
 * configuration.getSection('AzureFunctionsJobHost:openTelemetry').exists();
 * ```
 */

export { ConfigurationPath, KEY_DELIMITER } from './path.js';

export {
  MemoryConfigurationProvider,
  JsonConfigurationProvider,
  JsonFileConfigurationProvider,
  EnvironmentVariablesConfigurationProvider,
  flattenJson,
  type ConfigurationProvider,
  type JsonFileOptions,
} from './providers.js';

export {
  ConfigurationBuilder,
  ConfigurationRoot,
  ConfigurationSection,
  ChainedConfigurationProvider,
  type ConfigNode,
} from './configuration.js';

export { tryParseBool, parseCommaSeparated } from './parse.js';

export { configBoolean, configInteger } from './schemas.js';
