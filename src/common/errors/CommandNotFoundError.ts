import { BuildError, BuildErrorOptions } from "./BuildError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface CommandNotFoundErrorOptions extends BuildErrorOptions {
  command: string
}

/**
 * This error is thrown if an external tool cannot be spawned because it is
 * missing from the PATH.
 */
export class CommandNotFoundError extends BuildError {
  name = ERROR_NAMES.CommandNotFoundError
  code = ERROR_CODES.CommandNotFoundError

  command: string

  constructor(options: CommandNotFoundErrorOptions) {
    super(
      `Command "${options.command}" not found. Please ensure it is installed and in your PATH.`,
      options,
    )
    this.command = options.command
  }
}
