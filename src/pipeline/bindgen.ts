import * as fs from "fs"
import * as path from "path"

import { CommandRunner } from "../common/exec.js"
import { BuildConfig, checkOutDir } from "../config.js"

/**
 * bindgen regenerates the output directory from scratch with wasm-bindgen's
 * web target and returns the path of the generated `_bg.wasm`.
 */
export async function bindgen(
  run: CommandRunner,
  config: Pick<BuildConfig, "workdir" | "outDir" | "template" | "cacheDir">,
  wasm: string,
): Promise<string> {
  checkOutDir(config)
  fs.rmSync(config.outDir, { recursive: true, force: true })
  fs.mkdirSync(config.outDir, { recursive: true })

  await run(
    "wasm-bindgen",
    ["--no-typescript", "--target", "web", "--out-dir", config.outDir, wasm],
    { cwd: config.workdir },
  )

  return path.join(config.outDir, `${path.basename(wasm, ".wasm")}_bg.wasm`)
}
