import * as path from "path"

import { CommandRunner } from "../common/exec.js"
import { BuildConfig } from "../config.js"

type CargoConfig = Pick<
  BuildConfig,
  "workdir" | "crate" | "profile" | "features" | "target"
>

export function cargoArgs(config: CargoConfig): string[] {
  const args = ["build", "--profile", config.profile]

  if (config.features.length > 0) {
    args.push("-F", config.features.join(","))
  }

  args.push("--target", config.target)

  return args
}

/**
 * Path of the module cargo writes for the given profile and target.
 */
export function cargoArtifact(config: CargoConfig): string {
  return path.join(
    config.workdir,
    "target",
    config.target,
    config.profile,
    `${config.crate}.wasm`,
  )
}

/**
 * cargoBuild compiles the crate to WebAssembly and returns the module path.
 */
export async function cargoBuild(
  run: CommandRunner,
  config: CargoConfig,
): Promise<string> {
  await run("cargo", cargoArgs(config), { cwd: config.workdir })

  return cargoArtifact(config)
}
