import { log } from "../utils.js"
import { ErrorCodes, ErrorNames } from "./errors-codes.js"

export interface BuildErrorOptions {
  cause?: Error
}

/**
 * The base error. Every other error inherits this error.
 */
export abstract class BuildError extends Error {
  /**
   * The name of the build error.
   */
  abstract override readonly name: ErrorNames

  /**
   * The build specific error code.
   * Use this to identify build errors programmatically.
   */
  abstract readonly code: ErrorCodes

  /**
   * The original error, which caused the BuildError.
   */
  override readonly cause?: Error

  protected constructor(message: string, options?: BuildErrorOptions) {
    super(message)
    this.cause = options?.cause
  }

  /**
   * Pretty prints the error
   */
  printStackTrace() {
    log(this.stack)
  }
}
