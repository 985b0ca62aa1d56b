import * as fs from "fs"
import * as path from "path"

import { CommandRunner } from "../common/exec.js"
import { BuildConfig } from "../config.js"

export function optimizedName(crate: string, revision: string): string {
  return `${crate}-${revision}.wasm`
}

/**
 * optimize shrinks the module with `wasm-opt -Oz` into a file named after the
 * revision, then removes the unoptimized input.
 */
export async function optimize(
  run: CommandRunner,
  wasmOpt: string,
  config: Pick<BuildConfig, "workdir" | "outDir" | "crate">,
  input: string,
  revision: string,
): Promise<string> {
  const output = path.join(config.outDir, optimizedName(config.crate, revision))

  await run(wasmOpt, ["-Oz", input, "-o", output], { cwd: config.workdir })
  fs.rmSync(input, { force: true })

  return output
}
