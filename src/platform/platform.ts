import * as os from "os"

import { UnsupportedPlatformError } from "../common/errors/index.js"

/**
 * Architecture names used by prebuilt release archives.
 */
export type Arch = "x86_64" | "arm64"

/**
 * Operating system names used by prebuilt release archives.
 */
export type OS = "linux" | "macos"

export interface Platform {
  arch: Arch
  os: OS
}

/**
 * normalizedArch accepts both `uname -m` spellings and Node's `os.arch()`
 * ones.
 */
function normalizedArch(arch: string): Arch {
  switch (arch) {
    case "x86_64":
    case "x64":
    case "amd64":
      return "x86_64"
    case "aarch64":
    case "arm64":
      return "arm64"
    default:
      throw new UnsupportedPlatformError({
        component: "architecture",
        value: arch,
      })
  }
}

function normalizedOS(platform: string): OS {
  switch (platform.toLowerCase()) {
    case "linux":
      return "linux"
    case "darwin":
      return "macos"
    default:
      throw new UnsupportedPlatformError({ component: "OS", value: platform })
  }
}

/**
 * resolvePlatform maps raw host strings to the pair a release archive is
 * named after. The architecture is checked first.
 */
export function resolvePlatform(arch: string, platform: string): Platform {
  return {
    arch: normalizedArch(arch),
    os: normalizedOS(platform),
  }
}

/**
 * hostPlatform resolves the machine this process runs on.
 */
export function hostPlatform(): Platform {
  return resolvePlatform(os.machine(), os.type())
}
