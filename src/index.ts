import type { Logger } from "./application/interfaces/Logger";
import {
  createDefaultTypeRegistry,
  type EntityTypeRegistry,
} from "./application/registry/EntityTypeRegistry";
import { Config, type AppConfig } from "./infrastructure/config/Config";
import { WinstonLogger } from "./infrastructure/logging/WinstonLogger";
import { FileStorage } from "./infrastructure/storage/FileStorage";

export {
  BaseEntity,
  DISCRIMINATOR,
  isAttributeValue,
} from "./domain/entities/BaseEntity";
export type {
  AttributeValue,
  EntityInit,
  EntityRecord,
} from "./domain/entities/BaseEntity";
export * from "./domain/errors/EntityStoreError";
export type { EntityStorage } from "./domain/repositories/EntityStorage";
export { Timestamp } from "./domain/value-objects/Timestamp";
export type { LogMeta, Logger } from "./application/interfaces/Logger";
export {
  EntityTypeRegistry,
  createDefaultTypeRegistry,
} from "./application/registry/EntityTypeRegistry";
export type {
  EntityConstructor,
  EntityFactory,
} from "./application/registry/EntityTypeRegistry";
export { Config, LOG_LEVELS } from "./infrastructure/config/Config";
export type { AppConfig } from "./infrastructure/config/Config";
export { WinstonLogger } from "./infrastructure/logging/WinstonLogger";
export { FileStorage } from "./infrastructure/storage/FileStorage";

export interface CreateStorageOptions {
  config?: AppConfig;
  logger?: Logger;
  types?: EntityTypeRegistry;
}

/**
 * Wire the storage for this process and load whatever the backing file holds.
 * Call once at start-up and pass the result to every entity you create.
 */
export function createStorage(options: CreateStorageOptions = {}): FileStorage {
  const config = options.config ?? Config.getInstance().get();
  const logger =
    options.logger ??
    new WinstonLogger({
      level: config.logging.level,
      file: config.logging.file,
    });

  const storage = new FileStorage(
    config.storage.filePath,
    options.types ?? createDefaultTypeRegistry(),
    logger
  );
  storage.reload();

  logger.info("Storage ready", {
    filePath: config.storage.filePath,
    entities: storage.all().size,
  });
  return storage;
}
