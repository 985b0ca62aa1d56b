export { BuildError } from "./BuildError.js"
export type { BuildErrorOptions } from "./BuildError.js"
export { UnsupportedPlatformError } from "./UnsupportedPlatformError.js"
export type { PlatformComponent } from "./UnsupportedPlatformError.js"
export { ExecError } from "./ExecError.js"
export { CommandNotFoundError } from "./CommandNotFoundError.js"
export { ReleaseResolutionError } from "./ReleaseResolutionError.js"
export { ReleaseDownloadError } from "./ReleaseDownloadError.js"
export { ChecksumMismatchError } from "./ChecksumMismatchError.js"
export { RevisionError } from "./RevisionError.js"
export { ConfigError } from "./ConfigError.js"
export { TemplateError } from "./TemplateError.js"
export { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"
export { exitCodeFor } from "./exit.js"
