/**
 * Base error class for everything the entity store raises.
 */
export class EntityStoreError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EntityStoreError";
    this.code = code;
  }
}

/**
 * Thrown when a caller passes arguments an operation does not accept, or a value
 * that cannot be stored on an entity.
 */
export class InvalidArgumentError extends EntityStoreError {
  readonly field?: string;

  constructor(message: string, options?: { field?: string }) {
    super(message, "INVALID_ARGUMENT");
    this.name = "InvalidArgumentError";
    this.field = options?.field;
  }
}

/**
 * Thrown when the backing file cannot be read or written.
 */
export class StorageIOError extends EntityStoreError {
  readonly filePath: string;

  constructor(message: string, options: { filePath: string; cause: unknown }) {
    super(message, "STORAGE_IO", { cause: options.cause });
    this.name = "StorageIOError";
    this.filePath = options.filePath;
  }
}

/**
 * Thrown when the backing file does not hold the expected JSON document.
 */
export class DeserializationError extends EntityStoreError {
  readonly filePath: string;

  constructor(message: string, options: { filePath: string; cause?: unknown }) {
    super(message, "DESERIALIZATION", { cause: options.cause });
    this.name = "DeserializationError";
    this.filePath = options.filePath;
  }
}

/**
 * Thrown when a stored discriminator names a type nobody registered.
 */
export class EntityLookupError extends EntityStoreError {
  readonly typeName: string;

  constructor(typeName: string) {
    super(`Unknown entity type: ${typeName}`, "ENTITY_LOOKUP");
    this.name = "EntityLookupError";
    this.typeName = typeName;
  }
}

export function assertNoArguments(operation: string, args: readonly unknown[]): void {
  if (args.length > 0) {
    throw new InvalidArgumentError(
      `${operation}() takes no arguments (${args.length} given)`
    );
  }
}
