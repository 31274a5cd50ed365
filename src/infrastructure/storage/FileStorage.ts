import * as fs from "fs";
import type { Logger } from "../../application/interfaces/Logger";
import type { EntityTypeRegistry } from "../../application/registry/EntityTypeRegistry";
import {
  DISCRIMINATOR,
  type BaseEntity,
  type EntityRecord,
} from "../../domain/entities/BaseEntity";
import {
  DeserializationError,
  StorageIOError,
} from "../../domain/errors/EntityStoreError";
import type { EntityStorage } from "../../domain/repositories/EntityStorage";

// fs errors may come from another realm, where `instanceof Error` is false.
function errorCode(error: unknown): string | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return String(error);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Registry of live entities backed by a single JSON file.
 *
 * The file holds one object keyed by `<TypeName>.<id>`, each value being the
 * entity's `toDict()` output. Every save rewrites it in full.
 */
export class FileStorage implements EntityStorage {
  private readonly objects = new Map<string, BaseEntity>();

  constructor(
    private readonly filePath: string,
    private readonly types: EntityTypeRegistry,
    private readonly logger: Logger
  ) {}

  public get path(): string {
    return this.filePath;
  }

  public all(): ReadonlyMap<string, BaseEntity> {
    return this.objects;
  }

  public add(entity: BaseEntity): void {
    this.objects.set(entity.key, entity);
  }

  public remove(entity: BaseEntity): boolean {
    return this.objects.delete(entity.key);
  }

  public save(): void {
    const snapshot: Record<string, EntityRecord> = {};
    for (const [key, entity] of this.objects) {
      snapshot[key] = entity.toDict();
    }

    // Write beside the target, then rename over it.
    const tempPath = `${this.filePath}.tmp`;
    try {
      fs.writeFileSync(tempPath, JSON.stringify(snapshot, null, 2), "utf8");
      fs.renameSync(tempPath, this.filePath);
    } catch (error) {
      this.discardTempFile(tempPath);
      this.logger.error("Failed to save storage", {
        filePath: this.filePath,
        error: errorMessage(error),
      });
      throw new StorageIOError(
        `Cannot write ${this.filePath}: ${errorMessage(error)}`,
        { filePath: this.filePath, cause: error }
      );
    }

    this.logger.debug("Storage saved", {
      filePath: this.filePath,
      entities: this.objects.size,
    });
  }

  public reload(): void {
    let data: string;
    try {
      data = fs.readFileSync(this.filePath, "utf8");
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        this.logger.debug("No storage file, starting empty", {
          filePath: this.filePath,
        });
        return;
      }

      this.logger.error("Failed to read storage", {
        filePath: this.filePath,
        error: errorMessage(error),
      });
      throw new StorageIOError(
        `Cannot read ${this.filePath}: ${errorMessage(error)}`,
        { filePath: this.filePath, cause: error }
      );
    }

    const loaded = this.decode(data);
    for (const [key, entity] of loaded) {
      this.objects.set(key, entity);
    }

    this.logger.debug("Storage reloaded", {
      filePath: this.filePath,
      entities: loaded.length,
    });
  }

  public close(): void {
    this.save();
  }

  private decode(data: string): Array<[string, BaseEntity]> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      throw new DeserializationError(
        `${this.filePath} is not valid JSON: ${errorMessage(error)}`,
        { filePath: this.filePath, cause: error }
      );
    }

    if (!isPlainObject(parsed)) {
      throw new DeserializationError(
        `${this.filePath} must contain a JSON object`,
        { filePath: this.filePath }
      );
    }

    return Object.entries(parsed).map(([key, record]): [string, BaseEntity] => {
      if (!isPlainObject(record)) {
        throw new DeserializationError(`Entry ${key} is not an object`, {
          filePath: this.filePath,
        });
      }

      const typeName = record[DISCRIMINATOR];
      if (typeof typeName !== "string") {
        throw new DeserializationError(
          `Entry ${key} has no ${DISCRIMINATOR} field`,
          { filePath: this.filePath }
        );
      }

      return [key, this.types.create(typeName, this, record)];
    });
  }

  private discardTempFile(tempPath: string): void {
    try {
      fs.unlinkSync(tempPath);
    } catch (error) {
      if (errorCode(error) !== "ENOENT") {
        this.logger.warn("Failed to remove temporary storage file", {
          filePath: tempPath,
          error: errorMessage(error),
        });
      }
    }
  }
}
