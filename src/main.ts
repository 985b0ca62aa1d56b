#!/usr/bin/env node
import { BuildError, ExecError, exitCodeFor } from "./common/errors/index.js"
import { log, logger } from "./common/utils.js"
import { loadConfig } from "./config.js"
import { build } from "./pipeline/pipeline.js"

async function main(): Promise<void> {
  const result = await build(loadConfig())

  logger.info(`Wrote ${result.wasm}`)
  logger.info(`Wrote ${result.html}`)
  logger.color("green").log("Built and optimized wasm & web!")
}

main().catch((e: unknown) => {
  if (e instanceof BuildError) {
    logger.error(e.message)
    // The tool already printed its own output.
    if (e.cause && !(e instanceof ExecError)) {
      e.printStackTrace()
    }
  } else if (e instanceof Error) {
    logger.error(e.message)
    log(e.stack)
  } else {
    logger.error(String(e))
  }

  process.exitCode = exitCodeFor(e)
})
