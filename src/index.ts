export * from "./common/errors/index.js"
export { execaRunner } from "./common/exec.js"
export type { CommandResult, CommandRunner, RunOpts } from "./common/exec.js"
export { loadConfig } from "./config.js"
export type { BuildConfig } from "./config.js"
export { hostPlatform, resolvePlatform } from "./platform/platform.js"
export type { Arch, OS, Platform } from "./platform/platform.js"
export { BINARYEN, getWasmOpt } from "./provisioning/binaryen.js"
export { nodeFetch } from "./provisioning/fetch.js"
export type { FetchFn, FetchInit, FetchResponse } from "./provisioning/fetch.js"
export { ReleaseFetcher } from "./provisioning/release.js"
export type {
  ReleaseFetcherOpts,
  ReleaseSource,
} from "./provisioning/release.js"
export { bindgen } from "./pipeline/bindgen.js"
export { cargoArgs, cargoArtifact, cargoBuild } from "./pipeline/cargo.js"
export { optimize, optimizedName } from "./pipeline/optimize.js"
export { build } from "./pipeline/pipeline.js"
export type { BuildDeps, BuildResult } from "./pipeline/pipeline.js"
export { currentRevision } from "./pipeline/revision.js"
export {
  REVISION_PLACEHOLDER,
  stamp,
  stampTemplate,
} from "./pipeline/template.js"
export { getTracer, Tracer } from "./telemetry/tracer.js"
