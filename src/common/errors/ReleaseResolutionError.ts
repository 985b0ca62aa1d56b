import { BuildError, BuildErrorOptions } from "./BuildError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface ReleaseResolutionErrorOptions extends BuildErrorOptions {
  url: string
}

/**
 * This error is thrown if the latest release tag cannot be read from the
 * release host redirect.
 */
export class ReleaseResolutionError extends BuildError {
  name = ERROR_NAMES.ReleaseResolutionError
  code = ERROR_CODES.ReleaseResolutionError

  /**
   * The "latest release" URL that was queried.
   */
  url: string

  constructor(message: string, options: ReleaseResolutionErrorOptions) {
    super(message, options)
    this.url = options.url
  }
}
