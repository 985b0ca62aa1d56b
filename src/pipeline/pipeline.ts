import * as path from "path"

import { CommandRunner, execaRunner } from "../common/exec.js"
import { logger } from "../common/utils.js"
import { BuildConfig } from "../config.js"
import { Platform } from "../platform/platform.js"
import { getWasmOpt } from "../provisioning/binaryen.js"
import { FetchFn } from "../provisioning/fetch.js"
import { getTracer } from "../telemetry/tracer.js"
import { bindgen } from "./bindgen.js"
import { cargoBuild } from "./cargo.js"
import { optimize } from "./optimize.js"
import { currentRevision } from "./revision.js"
import { stampTemplate } from "./template.js"

export interface BuildDeps {
  run?: CommandRunner
  fetch?: FetchFn
  platform?: () => Platform
}

export interface BuildResult {
  revision: string

  /**
   * The optimized, revision named module.
   */
  wasm: string

  /**
   * The stamped HTML page.
   */
  html: string
}

/**
 * build runs every step in order. The first failing step rejects the
 * returned promise and nothing after it runs. Files produced so far stay
 * where they are.
 */
export async function build(
  config: BuildConfig,
  deps: BuildDeps = {},
): Promise<BuildResult> {
  const run = deps.run ?? execaRunner
  const tracer = getTracer()

  return tracer.startActiveSpan(
    "build",
    async () => {
      logger.info(`Building ${config.crate} for ${config.target}`)
      const compiled = await tracer.startActiveSpan("cargo build", () =>
        cargoBuild(run, config),
      )

      logger.info("bindgening wasm")
      const generated = await tracer.startActiveSpan("wasm-bindgen", () =>
        bindgen(run, config, compiled),
      )

      const wasmOpt = await tracer.startActiveSpan("provision wasm-opt", () =>
        getWasmOpt(config, { fetch: deps.fetch, platform: deps.platform }),
      )
      const revision = await currentRevision(run, config)

      logger.info("wasm-opt-ing the wasm")
      const wasm = await tracer.startActiveSpan(
        "wasm-opt",
        () => optimize(run, wasmOpt, config, generated, revision),
        { "build.revision": revision },
      )

      const html = path.join(config.outDir, "index.html")
      await tracer.startActiveSpan("stamp template", async () =>
        stampTemplate(config.template, html, revision),
      )

      return { revision, wasm, html }
    },
    { "build.crate": config.crate },
  )
}
