/**
 * Custom Error Classes
 */

/**
 * Base error for everything the model layer throws.
 */
export class ModelError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = "ModelError"
    this.cause = cause

    Error.captureStackTrace(this, this.constructor)
  }
}

export type SchemaErrorCode =
  | "UNKNOWN_PARENT"
  | "INHERITANCE_CYCLE"
  | "INVALID_DEFINITION"
  | "SCHEMA_NOT_FOUND"

/**
 * Structural schema error.
 * Thrown while loading or resolving class definitions.
 */
export class SchemaError extends ModelError {
  constructor(
    message: string,
    public readonly code: SchemaErrorCode,
    public readonly className?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = "SchemaError"
  }
}

/**
 * Thrown when a class name cannot be matched against the resolved schema.
 */
export class UnknownClassError extends ModelError {
  constructor(
    public readonly className: string,
    public readonly knownClasses: readonly string[],
  ) {
    super(`Unknown entity class: ${className}`)
    this.name = "UnknownClassError"
  }
}

/**
 * Thrown when an entity id is already used by any class.
 */
export class DuplicateIdError extends ModelError {
  constructor(
    public readonly entityId: string,
    public readonly existingClass: string,
  ) {
    super(
      `Duplicate id '${entityId}' already exists in class '${existingClass}'. Entity IDs must be globally unique.`,
    )
    this.name = "DuplicateIdError"
  }
}

export class EntityNotFoundError extends ModelError {
  constructor(public readonly entityId: string) {
    super(`No entity with id '${entityId}' found.`)
    this.name = "EntityNotFoundError"
  }
}

/**
 * Thrown when writing a field the entity's resolved class does not declare.
 */
export class UnknownFieldError extends ModelError {
  constructor(
    public readonly className: string,
    public readonly entityId: string,
    public readonly field: string,
    public readonly kind: "attribute" | "relation",
    public readonly known: readonly string[],
  ) {
    super(
      `[${className}:${entityId}] Unknown ${kind} '${field}'. Known ${kind}s: ${known.join(", ") || "<none>"}`,
    )
    this.name = "UnknownFieldError"
  }
}

export type ValueErrorCode = "COERCION" | "PATTERN" | "UNIT"

/**
 * Fatal write-time value error.
 * Enum and bound violations are not errors at write time; see the attribute engine.
 */
export class ValueError extends ModelError {
  constructor(
    message: string,
    public readonly code: ValueErrorCode,
    public readonly className: string,
    public readonly entityId: string,
    public readonly field: string,
    public readonly received: unknown,
    public readonly expected?: string,
  ) {
    super(message)
    this.name = "ValueError"
  }
}
