import { BuildError, BuildErrorOptions } from "./BuildError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface ExecErrorOptions extends BuildErrorOptions {
  cmd: string[]
  exitCode: number
}

/**
 *  This error is thrown if an external tool exits with a non zero code.
 */
export class ExecError extends BuildError {
  name = ERROR_NAMES.ExecError
  code = ERROR_CODES.ExecError

  /**
   * The command that caused the error.
   */
  cmd: string[]

  /**
   * The exit code of the command.
   */
  exitCode: number

  constructor(message: string, options: ExecErrorOptions) {
    super(message, options)
    this.cmd = options.cmd
    this.exitCode = options.exitCode
  }
}
