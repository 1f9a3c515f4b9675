/**
 * Configuration providers
 *
 * Each provider holds a flat map of colon-delimited keys to string values.
 * Lookups are case-insensitive; the casing first seen for a key is kept
 * when enumerating children.
 */

import { readFileSync, existsSync } from 'fs';
import { KEY_DELIMITER, normalizeKey } from './path.js';

export interface ConfigurationProvider {
  load(): void;
  tryGet(key: string): string | undefined;
  set(key: string, value: string | undefined): void;
  /**
   * Immediate child segment names below parentPath (all top level keys when undefined).
   */
  getChildKeys(parentPath: string | undefined): string[];
}

interface Entry {
  key: string;
  value: string;
}

/**
 * In-memory provider; base of the JSON and environment providers.
 */
export class MemoryConfigurationProvider implements ConfigurationProvider {
  protected readonly data = new Map<string, Entry>();

  constructor(private readonly initial: Record<string, string | undefined> = {}) {}

  load(): void {
    for (const [key, value] of Object.entries(this.initial)) {
      this.set(key, value);
    }
  }

  tryGet(key: string): string | undefined {
    return this.data.get(normalizeKey(key))?.value;
  }

  set(key: string, value: string | undefined): void {
    const normalized = normalizeKey(key);
    if (value === undefined) {
      this.data.delete(normalized);
      return;
    }
    const existing = this.data.get(normalized);
    this.data.set(normalized, { key: existing?.key ?? key, value });
  }

  getChildKeys(parentPath: string | undefined): string[] {
    const prefix = parentPath === undefined ? '' : normalizeKey(parentPath) + KEY_DELIMITER;
    const children: string[] = [];

    for (const [normalized, entry] of this.data) {
      if (!normalized.startsWith(prefix)) {
        continue;
      }
      const rest = entry.key.slice(prefix.length);
      const end = rest.indexOf(KEY_DELIMITER);
      children.push(end === -1 ? rest : rest.slice(0, end));
    }

    return children;
  }
}

/**
 * Flatten a parsed JSON document into colon-delimited keys.
 *
 * Arrays use their indexes as segments. Null values are skipped. An empty
 * object keeps its key with an empty value so the section still exists.
 */
export function flattenJson(value: unknown, prefix?: string): Record<string, string> {
  const out: Record<string, string> = {};
  visit(value, prefix, out);
  return out;
}

function visit(value: unknown, path: string | undefined, out: Record<string, string>): void {
  if (value === null || value === undefined) {
    return;
  }

  if (Array.isArray(value)) {
    value.forEach((item, index) => visit(item, join(path, String(index)), out));
    return;
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value);
    if (entries.length === 0 && path !== undefined) {
      out[path] = '';
    }
    for (const [key, child] of entries) {
      visit(child, join(path, key), out);
    }
    return;
  }

  if (path !== undefined) {
    out[path] = String(value);
  }
}

function join(path: string | undefined, key: string): string {
  return path === undefined ? key : path + KEY_DELIMITER + key;
}

/**
 * Provider over an already parsed JSON object, optionally mounted under a prefix.
 */
export class JsonConfigurationProvider extends MemoryConfigurationProvider {
  constructor(document: unknown, prefix?: string) {
    super(flattenJson(document, prefix));
  }
}

export interface JsonFileOptions {
  /** Do not fail when the file is missing */
  optional?: boolean;
  /** Mount the document under this path */
  prefix?: string;
}

/**
 * Provider reading a JSON file (host.json) at load time.
 */
export class JsonFileConfigurationProvider extends MemoryConfigurationProvider {
  constructor(
    private readonly path: string,
    private readonly options: JsonFileOptions = {}
  ) {
    super();
  }

  override load(): void {
    if (!existsSync(this.path)) {
      if (this.options.optional) {
        return;
      }
      throw new Error(`Configuration file '${this.path}' was not found`);
    }

    const document: unknown = JSON.parse(readFileSync(this.path, 'utf8'));
    for (const [key, value] of Object.entries(flattenJson(document, this.options.prefix))) {
      this.set(key, value);
    }
  }
}

/**
 * Provider over environment variables.
 *
 * `__` in a variable name is a section separator. When a prefix is given,
 * only matching variables are loaded and the prefix is stripped.
 */
export class EnvironmentVariablesConfigurationProvider extends MemoryConfigurationProvider {
  constructor(
    private readonly env: Record<string, string | undefined>,
    private readonly prefix?: string
  ) {
    super();
  }

  override load(): void {
    const prefix = this.prefix?.toLowerCase();
    for (const [name, value] of Object.entries(this.env)) {
      if (value === undefined) {
        continue;
      }
      if (prefix && !name.toLowerCase().startsWith(prefix)) {
        continue;
      }
      const key = (prefix ? name.slice(prefix.length) : name).replace(/__/g, KEY_DELIMITER);
      this.set(key, value);
    }
  }
}
