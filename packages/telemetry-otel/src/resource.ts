/**
 * Resource attributes for the host's OpenTelemetry providers
 */

import { randomUUID } from 'crypto';
import type { Attributes } from '@opentelemetry/api';
import { defaultResource, resourceFromAttributes, type Resource } from '@opentelemetry/resources';
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
} from '@opentelemetry/semantic-conventions';
import { HostError, ERROR_CODES, HOST_VERSION, SCRIPT_CONSTANTS, CONFIGURATION_SECTION_NAMES } from '@fnhost/kernel';
import { ConfigurationPath, tryParseBool, type ConfigurationRoot } from '@fnhost/config';
import { AI_SDK_PREFIX_ATTRIBUTE, OTEL_SECTION_NAMES } from '@fnhost/telemetry';

// Incubating semconv names; not exported from the stable entry point
const ATTR_SERVICE_NAMESPACE = 'service.namespace';
const ATTR_SERVICE_INSTANCE_ID = 'service.instance.id';

export interface ServiceResourceOptions {
  name: string;
  namespace?: string;
  version?: string;
  /** Generate a random instance id when none is given (default true) */
  autoGenerateServiceInstanceId?: boolean;
  instanceId?: string;
}

/**
 * Accumulates resource attributes; later additions win.
 */
export class ResourceBuilder {
  private readonly attributes: Attributes = {};

  addService(options: ServiceResourceOptions): this {
    this.attributes[ATTR_SERVICE_NAME] = options.name;
    if (options.namespace) {
      this.attributes[ATTR_SERVICE_NAMESPACE] = options.namespace;
    }
    if (options.version) {
      this.attributes[ATTR_SERVICE_VERSION] = options.version;
    }

    const instanceId =
      options.instanceId ?? (options.autoGenerateServiceInstanceId === false ? undefined : randomUUID());
    if (instanceId) {
      this.attributes[ATTR_SERVICE_INSTANCE_ID] = instanceId;
    }
    return this;
  }

  addAttributes(attributes: Attributes): this {
    Object.assign(this.attributes, attributes);
    return this;
  }

  getAttributes(): Attributes {
    return { ...this.attributes };
  }

  build(): Resource {
    return defaultResource().merge(resourceFromAttributes(this.attributes));
  }
}

/**
 * Apply `AzureFunctionsJobHost:openTelemetry:resources`, then mark the
 * telemetry as coming from this host.
 *
 * @throws HostError E_CONFIG_INVALID when a resource has no serviceName
 */
export function configureResource(configuration: ConfigurationRoot, resource: ResourceBuilder): void {
  const resources = configuration
    .getSection(
      ConfigurationPath.combine(
        CONFIGURATION_SECTION_NAMES.JOB_HOST,
        OTEL_SECTION_NAMES.OPEN_TELEMETRY,
        OTEL_SECTION_NAMES.RESOURCES
      )
    )
    .getChildren();

  for (const section of resources) {
    const name = section.get('serviceName');
    if (!name) {
      throw new HostError(
        ERROR_CODES.E_CONFIG_INVALID,
        `OpenTelemetry resource '${section.key}' requires a serviceName`
      );
    }

    resource.addService({
      name,
      namespace: section.get('serviceNamespace'),
      version: section.get('serviceVersion'),
      autoGenerateServiceInstanceId: tryParseBool(section.get('autoGenerateServiceInstanceId') ?? 'true') !== false,
      instanceId: section.get('serviceInstanceId'),
    });

    const attributes: Attributes = {};
    for (const attribute of section.getSection(OTEL_SECTION_NAMES.RESOURCE_ATTRIBUTES).getChildren()) {
      const value = attribute.value;
      if (value !== undefined) {
        attributes[attribute.key] = value;
      }
    }
    resource.addAttributes(attributes);
  }

  const prefix = SCRIPT_CONSTANTS.HOST_SDK_PREFIX;
  resource.addAttributes({
    [AI_SDK_PREFIX_ATTRIBUTE]: `${prefix}: ${HOST_VERSION} `,
    [`${prefix}_version`]: HOST_VERSION,
  });
}
