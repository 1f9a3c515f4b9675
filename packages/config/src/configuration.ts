/**
 * Layered configuration tree
 *
 * Providers are consulted last-to-first, so later providers override earlier
 * ones. Writes go to every provider.
 */

import type { z } from 'zod';
import { HostError, ERROR_CODES } from '@fnhost/kernel';
import { ConfigurationPath, normalizeKey } from './path.js';
import {
  MemoryConfigurationProvider,
  JsonConfigurationProvider,
  JsonFileConfigurationProvider,
  EnvironmentVariablesConfigurationProvider,
  type ConfigurationProvider,
  type JsonFileOptions,
} from './providers.js';

/**
 * Materialized configuration subtree
 */
export type ConfigNode = string | ConfigNode[] | { [key: string]: ConfigNode };

export class ConfigurationRoot {
  constructor(readonly providers: readonly ConfigurationProvider[]) {}

  get(key: string): string | undefined {
    for (let i = this.providers.length - 1; i >= 0; i--) {
      const value = this.providers[i].tryGet(key);
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  }

  set(key: string, value: string | undefined): void {
    for (const provider of this.providers) {
      provider.set(key, value);
    }
  }

  getSection(key: string): ConfigurationSection {
    return new ConfigurationSection(this, key);
  }

  getChildren(): ConfigurationSection[] {
    return this.getChildrenOf(undefined);
  }

  /** @internal */
  getChildrenOf(path: string | undefined): ConfigurationSection[] {
    const seen = new Map<string, string>();
    for (const provider of this.providers) {
      for (const key of provider.getChildKeys(path)) {
        const normalized = normalizeKey(key);
        if (!seen.has(normalized)) {
          seen.set(normalized, key);
        }
      }
    }

    return [...seen.values()].map(
      (key) => new ConfigurationSection(this, path === undefined ? key : ConfigurationPath.combine(path, key))
    );
  }
}

export class ConfigurationSection {
  constructor(
    private readonly root: ConfigurationRoot,
    readonly path: string
  ) {}

  get key(): string {
    return ConfigurationPath.getSectionKey(this.path);
  }

  get value(): string | undefined {
    return this.root.get(this.path);
  }

  set value(value: string | undefined) {
    this.root.set(this.path, value);
  }

  get(key: string): string | undefined {
    return this.root.get(ConfigurationPath.combine(this.path, key));
  }

  set(key: string, value: string | undefined): void {
    this.root.set(ConfigurationPath.combine(this.path, key), value);
  }

  getSection(key: string): ConfigurationSection {
    return new ConfigurationSection(this.root, ConfigurationPath.combine(this.path, key));
  }

  getChildren(): ConfigurationSection[] {
    return this.root.getChildrenOf(this.path);
  }

  /**
   * A section exists when it has a value or any children.
   */
  exists(): boolean {
    return this.value !== undefined || this.getChildren().length > 0;
  }

  /**
   * Materialize the subtree. Sections whose child keys are 0..n-1 become arrays.
   */
  toObject(): ConfigNode | undefined {
    const children = this.getChildren();
    if (children.length === 0) {
      return this.value;
    }

    const entries: Array<[string, ConfigNode]> = [];
    for (const child of children) {
      const node = child.toObject();
      if (node !== undefined) {
        entries.push([child.key, node]);
      }
    }

    if (entries.every(([key], index) => key === String(index))) {
      return entries.map(([, node]) => node);
    }

    return Object.fromEntries(entries);
  }

  /**
   * Bind the subtree to a zod schema.
   *
   * Object keys are camel-cased on the first letter so `Endpoint` and
   * `endpoint` bind to the same property. A missing or empty section binds
   * as `{}`.
   *
   * @throws HostError E_CONFIG_INVALID when validation fails
   */
  bind<S extends z.ZodTypeAny>(schema: S): z.output<S> {
    const node = this.toObject();
    const result = schema.safeParse(node === undefined || node === '' ? {} : camelCaseKeys(node));
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new HostError(ERROR_CODES.E_CONFIG_INVALID, `Invalid configuration at '${this.path}': ${issues}`);
    }
    return result.data;
  }
}

function camelCaseKeys(node: ConfigNode): ConfigNode {
  if (typeof node === 'string') {
    return node;
  }
  if (Array.isArray(node)) {
    return node.map(camelCaseKeys);
  }
  const out: { [key: string]: ConfigNode } = {};
  for (const [key, value] of Object.entries(node)) {
    out[key.charAt(0).toLowerCase() + key.slice(1)] = camelCaseKeys(value);
  }
  return out;
}

/**
 * Provider exposing another configuration root (read-through, write-through).
 */
export class ChainedConfigurationProvider implements ConfigurationProvider {
  constructor(private readonly configuration: ConfigurationRoot) {}

  load(): void {}

  tryGet(key: string): string | undefined {
    return this.configuration.get(key);
  }

  set(key: string, value: string | undefined): void {
    this.configuration.set(key, value);
  }

  getChildKeys(parentPath: string | undefined): string[] {
    return this.configuration.getChildrenOf(parentPath).map((section) => section.key);
  }
}

export class ConfigurationBuilder {
  private readonly providers: ConfigurationProvider[] = [];

  add(provider: ConfigurationProvider): this {
    this.providers.push(provider);
    return this;
  }

  addInMemoryCollection(values: Record<string, string | undefined>): this {
    return this.add(new MemoryConfigurationProvider(values));
  }

  addJson(document: unknown, prefix?: string): this {
    return this.add(new JsonConfigurationProvider(document, prefix));
  }

  addJsonFile(path: string, options?: JsonFileOptions): this {
    return this.add(new JsonFileConfigurationProvider(path, options));
  }

  addEnvironmentVariables(env: Record<string, string | undefined> = process.env, prefix?: string): this {
    return this.add(new EnvironmentVariablesConfigurationProvider(env, prefix));
  }

  addConfiguration(configuration: ConfigurationRoot): this {
    return this.add(new ChainedConfigurationProvider(configuration));
  }

  build(): ConfigurationRoot {
    for (const provider of this.providers) {
      provider.load();
    }
    return new ConfigurationRoot([...this.providers]);
  }
}
