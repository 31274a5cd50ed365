import { randomUUID } from "crypto";
import { inspect } from "util";
import {
  InvalidArgumentError,
  assertNoArguments,
} from "../errors/EntityStoreError";
import type { EntityStorage } from "../repositories/EntityStorage";
import { Timestamp } from "../value-objects/Timestamp";

export type AttributeValue = string | number | boolean;

/**
 * Key holding the concrete type name in serialized records.
 */
export const DISCRIMINATOR = "__class__";

const RESERVED_FIELDS: ReadonlySet<string> = new Set([
  "id",
  "created_at",
  "updated_at",
  DISCRIMINATOR,
]);

/**
 * Plain, JSON-ready form of an entity as produced by `toDict()`.
 */
export interface EntityRecord {
  id: string;
  created_at: string;
  updated_at: string;
  __class__: string;
  [attribute: string]: AttributeValue;
}

/**
 * Stored attributes handed back to a constructor. Values are checked at runtime
 * since they usually come straight out of a parsed file.
 */
export type EntityInit = Readonly<Record<string, unknown>>;

export function isAttributeValue(value: unknown): value is AttributeValue {
  return (
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  );
}

export class BaseEntity {
  readonly id: string;
  readonly createdAt: Date;
  private _updatedAt: Date;
  private readonly extra = new Map<string, AttributeValue>();

  /**
   * With no `init` (or an empty one) a fresh entity is created and registered
   * with `storage`. Otherwise the entity is rebuilt from a stored record and is
   * not registered; the caller decides where it goes.
   *
   * Trailing positional arguments are accepted and ignored. The reload path
   * passes the discriminator this way.
   */
  constructor(
    protected readonly storage: EntityStorage,
    init?: EntityInit,
    ..._ignored: unknown[]
  ) {
    if (init !== undefined && Object.keys(init).length > 0) {
      for (const [name, value] of Object.entries(init)) {
        if (value === null || value === undefined) {
          throw new InvalidArgumentError(`${name} cannot be null`, {
            field: name,
          });
        }
      }

      this.id = BaseEntity.parseId(init.id);
      this.createdAt = Timestamp.parse(init.created_at, "created_at");
      this._updatedAt = Timestamp.parse(init.updated_at, "updated_at");
      if (this._updatedAt.getTime() < this.createdAt.getTime()) {
        throw new InvalidArgumentError("updated_at precedes created_at", {
          field: "updated_at",
        });
      }

      for (const [name, value] of Object.entries(init)) {
        if (RESERVED_FIELDS.has(name)) {
          continue;
        }
        if (!isAttributeValue(value)) {
          throw new InvalidArgumentError(
            `${name} must be a string, finite number or boolean`,
            { field: name }
          );
        }
        this.extra.set(name, value);
      }
    } else {
      this.id = randomUUID();
      this.createdAt = Timestamp.now();
      this._updatedAt = new Date(this.createdAt.getTime());
      storage.add(this);
    }
  }

  private static parseId(value: unknown): string {
    if (typeof value !== "string" || value.trim().length === 0) {
      throw new InvalidArgumentError("id must be a non-empty string", {
        field: "id",
      });
    }
    return value;
  }

  /**
   * Discriminator written to `__class__` and used in the registry key.
   * Defaults to the runtime class name; override to pin a stable name.
   */
  public get typeName(): string {
    return this.constructor.name;
  }

  public get key(): string {
    return `${this.typeName}.${this.id}`;
  }

  public get updatedAt(): Date {
    return this._updatedAt;
  }

  public get attributes(): Record<string, AttributeValue> {
    return Object.fromEntries(this.extra);
  }

  public getAttribute(name: string): AttributeValue | undefined {
    return this.extra.get(name);
  }

  public hasAttribute(name: string): boolean {
    return this.extra.has(name);
  }

  public setAttribute(name: string, value: AttributeValue): void {
    if (RESERVED_FIELDS.has(name)) {
      throw new InvalidArgumentError(`${name} is a reserved field`, {
        field: name,
      });
    }
    if (!isAttributeValue(value)) {
      throw new InvalidArgumentError(
        `${name} must be a string, finite number or boolean`,
        { field: name }
      );
    }
    this.extra.set(name, value);
  }

  public deleteAttribute(name: string): boolean {
    return this.extra.delete(name);
  }

  /**
   * Refresh `updatedAt` and persist the whole registry.
   */
  public save(...unexpected: unknown[]): void {
    assertNoArguments("save", unexpected);
    const previous = this._updatedAt;
    this._updatedAt = Timestamp.now(previous);
    try {
      this.storage.save();
    } catch (error) {
      this._updatedAt = previous;
      throw error;
    }
  }

  public toDict(...unexpected: unknown[]): EntityRecord {
    assertNoArguments("toDict", unexpected);

    const record: EntityRecord = {
      id: this.id,
      created_at: Timestamp.format(this.createdAt),
      updated_at: Timestamp.format(this._updatedAt),
      [DISCRIMINATOR]: this.typeName,
    };
    for (const [name, value] of this.extra) {
      record[name] = value;
    }
    return record;
  }

  public toJSON(): EntityRecord {
    return this.toDict();
  }

  public toString(): string {
    const state = {
      id: this.id,
      created_at: this.createdAt,
      updated_at: this._updatedAt,
      ...Object.fromEntries(this.extra),
    };
    return `[${this.typeName}] (${this.id}) ${inspect(state, {
      breakLength: Infinity,
    })}`;
  }
}
