/**
 * fnhost kernel types
 */

/**
 * Error code definition
 */
export interface ErrorDefinition {
  code: string;
  title: string;
  description: string;
  retriable: boolean;
  category: 'configuration' | 'validation' | 'secrets' | 'infrastructure';
}

/**
 * Something that releases resources when the host shuts down.
 */
export interface Disposable {
  dispose(): void | Promise<void>;
}
