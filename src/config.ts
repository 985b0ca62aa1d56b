import * as path from "path"

import { ConfigError } from "./common/errors/index.js"

/**
 * BuildConfig holds everything the pipeline needs to know about the crate
 * and where things go.
 */
export interface BuildConfig {
  /**
   * Directory cargo and git run in.
   */
  workdir: string

  /**
   * Cargo package name, used to find the compiled module.
   */
  crate: string

  profile: string
  features: string[]
  target: string

  /**
   * Output directory, wiped at the start of the bindings step.
   */
  outDir: string

  /**
   * HTML template holding the revision placeholder.
   */
  template: string

  /**
   * Directory holding the downloaded binaryen releases.
   */
  cacheDir: string

  /**
   * Source revision to stamp, asked to git when unset.
   */
  revision?: string

  /**
   * Path to an installed wasm-opt, skips the download when set.
   */
  wasmOpt?: string

  /**
   * Check the downloaded archive against its published SHA-256.
   */
  verifyChecksum: boolean
}

export const DEFAULT_CRATE = "galaxy-cats"
export const DEFAULT_PROFILE = "wasm-release"
export const DEFAULT_FEATURES: readonly string[] = ["webgpu"]
export const DEFAULT_TARGET = "wasm32-unknown-unknown"
export const DEFAULT_OUT_DIR = "dist"
export const DEFAULT_TEMPLATE = "template.html"

function envValue(
  env: NodeJS.ProcessEnv,
  key: string,
): string | undefined {
  const value = env[key]?.trim()

  return value ? value : undefined
}

function envFlag(env: NodeJS.ProcessEnv, key: string): boolean {
  const value = envValue(env, key)?.toLowerCase()

  return value === "1" || value === "true"
}

function envList(env: NodeJS.ProcessEnv, key: string): string[] | undefined {
  const value = envValue(env, key)
  if (value === undefined) {
    return undefined
  }

  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "")
}

/**
 * isWithin reports whether target is dir itself or lies below it.
 */
function isWithin(target: string, dir: string): boolean {
  const rel = path.relative(dir, target)

  return (
    rel === "" ||
    (rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel))
  )
}

/**
 * checkOutDir rejects an output directory whose wipe would take the crate,
 * the template or the binaryen cache with it.
 */
export function checkOutDir(
  config: Pick<BuildConfig, "workdir" | "outDir" | "template" | "cacheDir">,
): void {
  const guarded: [string, string][] = [
    ["working directory", config.workdir],
    ["template", config.template],
    ["cache directory", config.cacheDir],
  ]

  for (const [what, target] of guarded) {
    if (isWithin(target, config.outDir)) {
      throw new ConfigError(
        `output directory ${config.outDir} would remove the ${what} ${target}`,
        { variable: "WASM_BUILD_OUT_DIR" },
      )
    }
  }
}

/**
 * loadConfig reads the build configuration from the environment. Relative
 * paths are resolved against cwd. An output directory that holds the working
 * directory, the template or the cache throws ConfigError.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): BuildConfig {
  const wasmOpt = envValue(env, "WASM_OPT_BIN")

  const config: BuildConfig = {
    workdir: cwd,
    crate: envValue(env, "WASM_BUILD_CRATE") ?? DEFAULT_CRATE,
    profile: envValue(env, "WASM_BUILD_PROFILE") ?? DEFAULT_PROFILE,
    features: envList(env, "WASM_BUILD_FEATURES") ?? [...DEFAULT_FEATURES],
    target: envValue(env, "WASM_BUILD_TARGET") ?? DEFAULT_TARGET,
    outDir: path.resolve(
      cwd,
      envValue(env, "WASM_BUILD_OUT_DIR") ?? DEFAULT_OUT_DIR,
    ),
    template: path.resolve(
      cwd,
      envValue(env, "WASM_BUILD_TEMPLATE") ?? DEFAULT_TEMPLATE,
    ),
    cacheDir: path.resolve(cwd, envValue(env, "WASM_BUILD_CACHE_DIR") ?? "."),
    revision: envValue(env, "WASM_BUILD_REVISION"),
    // A bare command name is looked up on the PATH.
    wasmOpt:
      wasmOpt && wasmOpt.includes("/") ? path.resolve(cwd, wasmOpt) : wasmOpt,
    verifyChecksum: envFlag(env, "WASM_BUILD_VERIFY_CHECKSUM"),
  }
  checkOutDir(config)

  return config
}
