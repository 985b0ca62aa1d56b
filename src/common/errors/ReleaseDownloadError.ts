import { BuildError, BuildErrorOptions } from "./BuildError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface ReleaseDownloadErrorOptions extends BuildErrorOptions {
  url: string
}

/**
 *  This error is thrown if a release archive cannot be downloaded or extracted.
 */
export class ReleaseDownloadError extends BuildError {
  name = ERROR_NAMES.ReleaseDownloadError
  code = ERROR_CODES.ReleaseDownloadError

  url: string

  constructor(message: string, options: ReleaseDownloadErrorOptions) {
    super(message, options)
    this.url = options.url
  }
}
