import { BuildError, BuildErrorOptions } from "./BuildError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface TemplateErrorOptions extends BuildErrorOptions {
  template: string
}

/**
 * This error is thrown if the HTML template cannot be read or the stamped
 * page cannot be written.
 */
export class TemplateError extends BuildError {
  name = ERROR_NAMES.TemplateError
  code = ERROR_CODES.TemplateError

  template: string

  constructor(message: string, options: TemplateErrorOptions) {
    super(message, options)
    this.template = options.template
  }
}
