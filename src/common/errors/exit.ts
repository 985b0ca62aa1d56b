import { ExecError } from "./ExecError.js"

/**
 * Process exit status for an error that ended the build: the failing tool's
 * own code when there is one, 1 otherwise.
 */
export function exitCodeFor(e: unknown): number {
  if (e instanceof ExecError && e.exitCode !== 0) {
    return e.exitCode
  }

  return 1
}
