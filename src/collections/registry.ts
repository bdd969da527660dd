import { InvalidConfigurationError, UnknownCollectionError } from '../errors.js';
import type { CollectionRegistration } from './types.js';

/**
 * Collection Registry - ordered mapping of logical collection names to source documents.
 * Never touches storage.
 */
export class CollectionRegistry {
  private registrations: Map<string, CollectionRegistration> = new Map();

  constructor(registrations: CollectionRegistration[] = []) {
    for (const registration of registrations) {
      this.register(registration.name, registration.sourceDocument);
    }
  }

  /**
   * Append a registration. Names are unique for the lifetime of the registry.
   */
  register(name: string, sourceDocument?: string): void {
    if (!name.trim()) {
      throw new InvalidConfigurationError('collection name', 'must not be empty', 'register');
    }
    if (this.registrations.has(name)) {
      throw new InvalidConfigurationError('collection name', `"${name}" is registered twice`, 'register');
    }
    this.registrations.set(name, { name, sourceDocument });
  }

  /**
   * List registrations in insertion order.
   */
  list(): CollectionRegistration[] {
    return Array.from(this.registrations.values(), (registration) => ({ ...registration }));
  }

  has(name: string): boolean {
    return this.registrations.has(name);
  }

  /**
   * Resolve a name to its source document (undefined when none was recorded).
   */
  resolve(name: string): string | undefined {
    const registration = this.registrations.get(name);
    if (!registration) {
      throw new UnknownCollectionError(name, Array.from(this.registrations.keys()));
    }
    return registration.sourceDocument;
  }
}
