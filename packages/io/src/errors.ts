/**
 * Serializer Errors
 */

import { ModelError } from "@domodel/core"
import type { ImportUnknown } from "./import/types"

export type ImportErrorCode = "UNKNOWN_FIELDS" | "MALFORMED"

/**
 * Thrown when an import cannot be applied.
 *
 * With `UNKNOWN_FIELDS` the model has not been modified.
 */
export class ImportError extends ModelError {
  constructor(
    message: string,
    public readonly code: ImportErrorCode,
    public readonly unknowns: readonly ImportUnknown[] = [],
    public readonly source?: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "ImportError"
  }
}
