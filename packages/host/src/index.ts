/**
 * @fnhost/host - web host bootstrap
 *
 * Registers the host's services in a container, wires the telemetry
 * pipeline selected by host.json and runs the worker console log service.
 *
 * @packageDocumentation
 */

export {
  ServiceContainer,
  ServiceToken,
  createToken,
  isDisposable,
  type Registration,
  type RegisterOptions,
  type ServiceFactory,
} from './container.js';
export { ScriptSettingsManager, type WebHostSettings } from './settings.js';
export { ScriptEventManager, type ScriptEvent, type ScriptEventListener } from './events.js';
export { HostTelemetry, HostTelemetrySetup, type HostTelemetryOptions } from './telemetry-setup.js';
export { WebHostResolver, type WebHostResolverOptions } from './resolver.js';
export { HOST_SERVICES, initializeWebHost, type WebHostOptions } from './bootstrap.js';
export {
  CONSOLE_LOG_SERVICES,
  HOST_JSON_FILE,
  buildHostConfiguration,
  createHost,
  type CreateHostOptions,
  type ScriptHost,
} from './host.js';
