/**
 * Errors Module
 */

export {
  ModelError,
  SchemaError,
  UnknownClassError,
  DuplicateIdError,
  EntityNotFoundError,
  UnknownFieldError,
  ValueError,
} from "./errors"
export type { SchemaErrorCode, ValueErrorCode } from "./errors"
