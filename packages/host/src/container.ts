/**
 * Service container
 *
 * A small typed container for the web host's services. Registrations are
 * keyed by tokens created with `createToken<T>(name)`; each token keeps
 * its registration per container so `resolve` needs no casts.
 *
 * Lifetimes:
 * - `registerInstance`: the given value, never disposed by the container
 * - `registerSingleton`: created on first resolve, disposed with the container
 * - `register`: created on every resolve; disposed with the container
 *   unless `externallyOwned`
 */

import { HostError, ERROR_CODES, type Disposable } from '@fnhost/kernel';

export type ServiceFactory<T> = (container: ServiceContainer) => T;

export interface Registration<T> {
  factory: ServiceFactory<T>;
  singleton: boolean;
  externallyOwned: boolean;
  instance?: { value: T };
}

export class ServiceToken<T> {
  private readonly registrations = new WeakMap<ServiceContainer, Registration<T>>();

  constructor(readonly name: string) {}

  /** @internal */
  bind(container: ServiceContainer, registration: Registration<T>): void {
    this.registrations.set(container, registration);
  }

  /** @internal */
  lookup(container: ServiceContainer): Registration<T> | undefined {
    return this.registrations.get(container);
  }

  toString(): string {
    return this.name;
  }
}

export function createToken<T>(name: string): ServiceToken<T> {
  return new ServiceToken<T>(name);
}

export interface RegisterOptions {
  /** Someone else disposes what the factory returns */
  externallyOwned?: boolean;
}

export function isDisposable(value: unknown): value is Disposable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'dispose' in value &&
    typeof value.dispose === 'function'
  );
}

export class ServiceContainer implements Disposable {
  /** Owned instances in creation order */
  private readonly owned: Disposable[] = [];
  private readonly tokens = new Set<string>();
  private disposed = false;

  registerInstance<T>(token: ServiceToken<T>, value: T): this {
    return this.add(token, { factory: () => value, singleton: true, externallyOwned: true, instance: { value } });
  }

  registerSingleton<T>(token: ServiceToken<T>, factory: ServiceFactory<T>): this {
    return this.add(token, { factory, singleton: true, externallyOwned: false });
  }

  register<T>(token: ServiceToken<T>, factory: ServiceFactory<T>, options: RegisterOptions = {}): this {
    return this.add(token, { factory, singleton: false, externallyOwned: options.externallyOwned ?? false });
  }

  isRegistered<T>(token: ServiceToken<T>): boolean {
    return token.lookup(this) !== undefined;
  }

  /**
   * @throws HostError E_SERVICE_NOT_REGISTERED when the token has no registration
   */
  resolve<T>(token: ServiceToken<T>): T {
    this.assertNotDisposed();
    const registration = token.lookup(this);
    if (!registration) {
      throw new HostError(ERROR_CODES.E_SERVICE_NOT_REGISTERED, `Service '${token.name}' is not registered`);
    }

    if (registration.instance) {
      return registration.instance.value;
    }

    const value = registration.factory(this);
    if (registration.singleton) {
      registration.instance = { value };
    }
    if (!registration.externallyOwned && isDisposable(value)) {
      this.owned.push(value);
    }
    return value;
  }

  /**
   * Dispose owned instances, last created first.
   */
  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;

    for (const instance of this.owned.splice(0).reverse()) {
      await instance.dispose();
    }
  }

  /** Names of registered tokens, in registration order */
  get registeredNames(): readonly string[] {
    return [...this.tokens];
  }

  private add<T>(token: ServiceToken<T>, registration: Registration<T>): this {
    this.assertNotDisposed();
    token.bind(this, registration);
    this.tokens.add(token.name);
    return this;
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new HostError(ERROR_CODES.E_DISPOSED, 'The service container has been disposed');
    }
  }
}
