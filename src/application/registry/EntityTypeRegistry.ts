// Entity type registry - maps discriminators to factories used on reload

import {
  BaseEntity,
  type EntityInit,
} from "../../domain/entities/BaseEntity";
import {
  EntityLookupError,
  InvalidArgumentError,
} from "../../domain/errors/EntityStoreError";
import type { EntityStorage } from "../../domain/repositories/EntityStorage";

export type EntityFactory = (
  storage: EntityStorage,
  record: EntityInit
) => BaseEntity;

export type EntityConstructor = new (
  storage: EntityStorage,
  init?: EntityInit,
  ...ignored: unknown[]
) => BaseEntity;

/**
 * Registry of constructible entity types.
 * Maps the `__class__` value found in stored records to a factory.
 *
 * The set of concrete types lives outside the store, so it is handed over when
 * the storage is wired up.
 */
export class EntityTypeRegistry {
  private factories = new Map<string, EntityFactory>();

  /**
   * Register a factory for a discriminator.
   *
   * @throws InvalidArgumentError if the discriminator is already taken
   */
  register(typeName: string, factory: EntityFactory): void {
    if (this.factories.has(typeName)) {
      throw new InvalidArgumentError(
        `Entity type already registered: ${typeName}`,
        { field: "typeName" }
      );
    }
    this.factories.set(typeName, factory);
  }

  /**
   * Register a class whose constructor follows the `BaseEntity` convention.
   */
  registerClass(typeName: string, ctor: EntityConstructor): void {
    this.register(
      typeName,
      (storage, record) => new ctor(storage, record, typeName)
    );
  }

  /**
   * @returns true if a factory was removed, false if none existed
   */
  unregister(typeName: string): boolean {
    return this.factories.delete(typeName);
  }

  get(typeName: string): EntityFactory | undefined {
    return this.factories.get(typeName);
  }

  has(typeName: string): boolean {
    return this.factories.has(typeName);
  }

  getRegisteredTypes(): string[] {
    return Array.from(this.factories.keys());
  }

  /**
   * Rebuild an entity of the named type from its stored record.
   *
   * @throws EntityLookupError if no factory is registered for `typeName`
   */
  create(
    typeName: string,
    storage: EntityStorage,
    record: EntityInit
  ): BaseEntity {
    const factory = this.factories.get(typeName);
    if (!factory) {
      throw new EntityLookupError(typeName);
    }
    return factory(storage, record);
  }
}

export function createDefaultTypeRegistry(): EntityTypeRegistry {
  const registry = new EntityTypeRegistry();
  registry.registerClass("BaseEntity", BaseEntity);
  return registry;
}
