import { Result, ok, err } from "../lib/result.js";
import { ResolutionError } from "../lib/errors.js";
import { typeName } from "../format/primitives.js";

/**
 * Source of argument values for replacement fields
 */
export interface ArgumentResolver {
  /** Value for an automatically numbered field ("{}") */
  next(): Result<unknown, ResolutionError>;
  /** Value for a named or numbered field ("{name}", "{0}") */
  resolve(name: string): Result<unknown, ResolutionError>;
}

const INDEX_PATTERN = /^\d+$/;

function noAutoNumbering(): Result<never, ResolutionError> {
  return err(
    new ResolutionError("Automatic field numbering requires positional arguments")
  );
}

/**
 * Resolves fields against a list of values
 */
export class PositionalResolver implements ArgumentResolver {
  private cursor = 0;

  constructor(private readonly values: readonly unknown[]) {}

  next(): Result<unknown, ResolutionError> {
    const result = this.at(this.cursor);
    if (result.success) {
      this.cursor++;
    }
    return result;
  }

  resolve(name: string): Result<unknown, ResolutionError> {
    if (!INDEX_PATTERN.test(name)) {
      return err(new ResolutionError(`Invalid index: ${name}`, { name }));
    }
    return this.at(Number.parseInt(name, 10));
  }

  private at(index: number): Result<unknown, ResolutionError> {
    if (index >= this.values.length) {
      return err(
        new ResolutionError(
          `Format index (${index}) out of range (${this.values.length})`,
          { index, length: this.values.length }
        )
      );
    }
    return ok(this.values[index]);
  }
}

/**
 * Resolves fields by key against a Map or a plain record
 */
export class KeyedResolver implements ArgumentResolver {
  constructor(
    private readonly mapping: ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>>
  ) {}

  next(): Result<unknown, ResolutionError> {
    return noAutoNumbering();
  }

  resolve(name: string): Result<unknown, ResolutionError> {
    if (this.mapping instanceof Map) {
      return this.mapping.has(name) ? ok(this.mapping.get(name)) : this.missing(name);
    }
    return Object.hasOwn(this.mapping, name)
      ? ok(Reflect.get(this.mapping, name))
      : this.missing(name);
  }

  private missing(name: string): Result<never, ResolutionError> {
    return err(new ResolutionError(`KeyError: ${name}`, { key: name }));
  }
}

/**
 * Resolves fields against the fields of an object: its own properties and
 * getters declared on its class. Methods are not fields.
 */
export class RecordResolver implements ArgumentResolver {
  private constructor(private readonly record: object) {}

  /**
   * Wrap a record, rejecting primitives and arrays
   */
  static create(record: unknown): Result<RecordResolver, ResolutionError> {
    if (typeof record !== "object" || record === null || Array.isArray(record)) {
      return err(
        new ResolutionError("formatRecord must be called with an object", {
          received: typeName(record),
        })
      );
    }
    return ok(new RecordResolver(record));
  }

  next(): Result<unknown, ResolutionError> {
    return noAutoNumbering();
  }

  resolve(name: string): Result<unknown, ResolutionError> {
    if (this.hasField(name)) {
      return ok(Reflect.get(this.record, name));
    }
    return err(new ResolutionError(`KeyError: ${name}`, { key: name }));
  }

  private hasField(name: string): boolean {
    if (Object.hasOwn(this.record, name)) {
      return true;
    }
    let proto: unknown = Object.getPrototypeOf(this.record);
    while (typeof proto === "object" && proto !== null && proto !== Object.prototype) {
      const descriptor = Object.getOwnPropertyDescriptor(proto, name);
      if (descriptor !== undefined) {
        return descriptor.get !== undefined;
      }
      proto = Object.getPrototypeOf(proto);
    }
    return false;
  }
}
