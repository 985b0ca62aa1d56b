export const ERROR_CODES = {
  /**
   * {@link UnsupportedPlatformError}
   */
  UnsupportedPlatformError: "W100",

  /**
   * {@link ExecError}
   */
  ExecError: "W101",

  /**
   * {@link CommandNotFoundError}
   */
  CommandNotFoundError: "W102",

  /**
   * {@link ReleaseResolutionError}
   */
  ReleaseResolutionError: "W103",

  /**
   * {@link ReleaseDownloadError}
   */
  ReleaseDownloadError: "W104",

  /**
   * {@link ChecksumMismatchError}
   */
  ChecksumMismatchError: "W105",

  /**
   * {@link RevisionError}
   */
  RevisionError: "W106",

  /**
   * {@link ConfigError}
   */
  ConfigError: "W107",

  /**
   * {@link TemplateError}
   */
  TemplateError: "W108",
} as const

type ErrorCodesType = typeof ERROR_CODES
export type ErrorNames = keyof ErrorCodesType
export type ErrorCodes = ErrorCodesType[ErrorNames]

export const ERROR_NAMES = {
  UnsupportedPlatformError: "UnsupportedPlatformError",
  ExecError: "ExecError",
  CommandNotFoundError: "CommandNotFoundError",
  ReleaseResolutionError: "ReleaseResolutionError",
  ReleaseDownloadError: "ReleaseDownloadError",
  ChecksumMismatchError: "ChecksumMismatchError",
  RevisionError: "RevisionError",
  ConfigError: "ConfigError",
  TemplateError: "TemplateError",
} as const satisfies { readonly [Key in ErrorNames]: Key }
