import { BuildError, BuildErrorOptions } from "./BuildError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

/**
 * This error is thrown if the current source revision cannot be determined.
 */
export class RevisionError extends BuildError {
  name = ERROR_NAMES.RevisionError
  code = ERROR_CODES.RevisionError

  constructor(message: string, options?: BuildErrorOptions) {
    super(message, options)
  }
}
