import { CommandRunner } from "../common/exec.js"
import { RevisionError } from "../common/errors/index.js"
import { BuildConfig } from "../config.js"

// The revision becomes part of an output file name.
const REVISION_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/

function checkRevision(revision: string): string {
  if (!REVISION_PATTERN.test(revision)) {
    throw new RevisionError(
      `revision ${JSON.stringify(revision)} is not a plain file name segment`,
    )
  }

  return revision
}

/**
 * currentRevision returns the commit hash the build is made from. A
 * configured revision wins over asking git.
 */
export async function currentRevision(
  run: CommandRunner,
  config: Pick<BuildConfig, "workdir" | "revision">,
): Promise<string> {
  if (config.revision) {
    return checkRevision(config.revision)
  }

  const { stdout } = await run("git", ["rev-parse", "HEAD"], {
    cwd: config.workdir,
    captureOutput: true,
  })

  const revision = stdout.trim()
  if (revision === "") {
    throw new RevisionError("git rev-parse HEAD returned an empty revision")
  }

  return checkRevision(revision)
}
