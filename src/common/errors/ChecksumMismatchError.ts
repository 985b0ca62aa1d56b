import { BuildError, BuildErrorOptions } from "./BuildError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface ChecksumMismatchErrorOptions extends BuildErrorOptions {
  expected: string
  actual: string
}

/**
 * This error is thrown if a downloaded archive does not match the SHA-256
 * published next to it.
 */
export class ChecksumMismatchError extends BuildError {
  name = ERROR_NAMES.ChecksumMismatchError
  code = ERROR_CODES.ChecksumMismatchError

  expected: string
  actual: string

  constructor(options: ChecksumMismatchErrorOptions) {
    super(
      `checksum mismatch: expected ${options.expected}, got ${options.actual}`,
      options,
    )
    this.expected = options.expected
    this.actual = options.actual
  }
}
