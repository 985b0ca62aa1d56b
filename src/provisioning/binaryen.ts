import { BuildConfig } from "../config.js"
import { hostPlatform, Platform } from "../platform/platform.js"
import { FetchFn, nodeFetch } from "./fetch.js"
import { ReleaseFetcher, ReleaseSource } from "./release.js"

export const BINARYEN: ReleaseSource = {
  name: "binaryen",
  repository: "WebAssembly/binaryen",
  executable: ["bin", "wasm-opt"],
}

export interface WasmOptDeps {
  fetch?: FetchFn
  platform?: () => Platform
}

/**
 * getWasmOpt returns the wasm-opt to run: the configured one if any,
 * otherwise the one from the latest binaryen release for this host.
 */
export async function getWasmOpt(
  config: Pick<BuildConfig, "wasmOpt" | "cacheDir" | "verifyChecksum">,
  deps: WasmOptDeps = {},
): Promise<string> {
  if (config.wasmOpt) {
    return config.wasmOpt
  }

  const fetcher = new ReleaseFetcher(BINARYEN, {
    cacheDir: config.cacheDir,
    platform: (deps.platform ?? hostPlatform)(),
    fetch: deps.fetch ?? nodeFetch,
    verifyChecksum: config.verifyChecksum,
  })

  return fetcher.ensure()
}
