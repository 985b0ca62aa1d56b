import * as fs from "fs"

import { TemplateError } from "../common/errors/index.js"

export const REVISION_PLACEHOLDER = "{git-hash-here}"

/**
 * stamp replaces every literal occurrence of the placeholder.
 */
export function stamp(
  content: string,
  revision: string,
  placeholder = REVISION_PLACEHOLDER,
): string {
  return content.split(placeholder).join(revision)
}

/**
 * stampTemplate writes the template to output with the revision filled in.
 */
export function stampTemplate(
  template: string,
  output: string,
  revision: string,
): void {
  try {
    fs.writeFileSync(output, stamp(fs.readFileSync(template, "utf8"), revision))
  } catch (e) {
    throw new TemplateError(
      `failed to stamp ${template} into ${output}: ${e}`,
      { template, cause: e instanceof Error ? e : undefined },
    )
  }
}
