import { BuildError, BuildErrorOptions } from "./BuildError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface ConfigErrorOptions extends BuildErrorOptions {
  variable: string
}

/**
 * This error is thrown if a configured value would make the build destroy
 * or misplace files.
 */
export class ConfigError extends BuildError {
  name = ERROR_NAMES.ConfigError
  code = ERROR_CODES.ConfigError

  /**
   * The environment variable holding the rejected value.
   */
  variable: string

  constructor(message: string, options: ConfigErrorOptions) {
    super(message, options)
    this.variable = options.variable
  }
}
