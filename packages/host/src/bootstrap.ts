/**
 * Web host service registrations
 */

import type { LoggerFactory } from '@fnhost/logging';
import { DefaultSecretManagerFactory, type SecretManager, type SecretManagerFactory } from '@fnhost/secrets';
import { createToken, type ServiceContainer } from './container.js';
import { ScriptEventManager } from './events.js';
import { WebHostResolver, type WebHostResolverOptions } from './resolver.js';
import type { ScriptSettingsManager, WebHostSettings } from './settings.js';
import type { HostTelemetry } from './telemetry-setup.js';

export const HOST_SERVICES = {
  settingsManager: createToken<ScriptSettingsManager>('ScriptSettingsManager'),
  webHostSettings: createToken<WebHostSettings>('WebHostSettings'),
  webHostResolver: createToken<WebHostResolver>('WebHostResolver'),
  secretManagerFactory: createToken<SecretManagerFactory>('SecretManagerFactory'),
  eventManager: createToken<ScriptEventManager>('ScriptEventManager'),
  loggerFactory: createToken<LoggerFactory>('LoggerFactory'),
  secretManager: createToken<SecretManager>('SecretManager'),
  hostTelemetry: createToken<HostTelemetry>('HostTelemetry'),
} as const;

export interface WebHostOptions extends WebHostResolverOptions {
  secretManagerFactory?: SecretManagerFactory;
}

export function initializeWebHost(
  settingsManager: ScriptSettingsManager,
  container: ServiceContainer,
  settings: WebHostSettings,
  options: WebHostOptions = {}
): void {
  const { secretManagerFactory, ...resolverOptions } = options;

  container
    .registerInstance(HOST_SERVICES.settingsManager, settingsManager)
    .registerInstance(HOST_SERVICES.webHostSettings, settings)
    .registerSingleton(
      HOST_SERVICES.webHostResolver,
      (c) =>
        new WebHostResolver(
          c.resolve(HOST_SERVICES.settingsManager),
          c.resolve(HOST_SERVICES.secretManagerFactory),
          c.resolve(HOST_SERVICES.eventManager),
          resolverOptions
        )
    )
    .registerSingleton(HOST_SERVICES.secretManagerFactory, () => secretManagerFactory ?? new DefaultSecretManagerFactory())
    .registerSingleton(HOST_SERVICES.eventManager, () => new ScriptEventManager());

  // Owned by the resolver, which disposes them with itself
  container
    .register(HOST_SERVICES.loggerFactory, (c) => c.resolve(HOST_SERVICES.webHostResolver).getLoggerFactory(settings), {
      externallyOwned: true,
    })
    .register(HOST_SERVICES.secretManager, (c) => c.resolve(HOST_SERVICES.webHostResolver).getSecretManager(settings), {
      externallyOwned: true,
    })
    .register(HOST_SERVICES.hostTelemetry, (c) => c.resolve(HOST_SERVICES.webHostResolver).getHostTelemetry(settings), {
      externallyOwned: true,
    });
}
