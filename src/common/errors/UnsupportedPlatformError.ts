import { BuildError, BuildErrorOptions } from "./BuildError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

export type PlatformComponent = "architecture" | "OS"

interface UnsupportedPlatformErrorOptions extends BuildErrorOptions {
  component: PlatformComponent
  value: string
}

/**
 * This error is thrown if the host architecture or operating system has no
 * prebuilt tool release.
 */
export class UnsupportedPlatformError extends BuildError {
  name = ERROR_NAMES.UnsupportedPlatformError
  code = ERROR_CODES.UnsupportedPlatformError

  /**
   * Which half of the platform pair was rejected.
   */
  component: PlatformComponent

  /**
   * The raw value reported by the host.
   */
  value: string

  constructor(options: UnsupportedPlatformErrorOptions) {
    super(`Unsupported ${options.component}: ${options.value}`, options)
    this.component = options.component
    this.value = options.value
  }
}
