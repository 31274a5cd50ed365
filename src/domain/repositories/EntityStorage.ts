import type { BaseEntity } from "../entities/BaseEntity";

export interface EntityStorage {
  /**
   * Every tracked entity, keyed by `<TypeName>.<id>`
   */
  all(): ReadonlyMap<string, BaseEntity>;

  /**
   * Upsert an entity under its registry key
   */
  add(entity: BaseEntity): void;

  /**
   * Drop an entity from the registry; returns false when it was not tracked
   */
  remove(entity: BaseEntity): boolean;

  /**
   * Rewrite the backing file with the whole registry
   */
  save(): void;

  /**
   * Load the backing file into the registry, if it exists
   */
  reload(): void;

  /**
   * Flush the registry one last time
   */
  close(): void;
}
