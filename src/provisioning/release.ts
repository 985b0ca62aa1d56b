import * as crypto from "crypto"
import * as fs from "fs"
import * as path from "path"
import { pipeline } from "stream/promises"
import * as tar from "tar"

import {
  ChecksumMismatchError,
  ReleaseDownloadError,
  ReleaseResolutionError,
} from "../common/errors/index.js"
import { logger } from "../common/utils.js"
import { Platform } from "../platform/platform.js"
import { FetchFn, FetchResponse } from "./fetch.js"

const RELEASE_HOST = "https://github.com"

/**
 * ReleaseSource describes a tool published as GitHub release archives named
 * `<name>-<tag>-<arch>-<os>.tar.gz`, each holding a `<name>-<tag>` directory.
 */
export interface ReleaseSource {
  /**
   * Archive prefix, also the prefix of every cache directory.
   */
  name: string

  /**
   * GitHub repository in `owner/repo` form.
   */
  repository: string

  /**
   * Path of the wanted executable inside the extracted directory.
   */
  executable: string[]
}

export interface ReleaseFetcherOpts {
  cacheDir: string
  platform: Platform
  fetch: FetchFn
  verifyChecksum?: boolean
  host?: string
}

/**
 * ReleaseFetcher keeps the latest release of a tool extracted in a cache
 * directory, one version at a time.
 */
export class ReleaseFetcher {
  private readonly source: ReleaseSource
  private readonly cacheDir: string
  private readonly platform: Platform
  private readonly fetch: FetchFn
  private readonly verifyChecksum: boolean
  private readonly host: string

  constructor(source: ReleaseSource, opts: ReleaseFetcherOpts) {
    this.source = source
    this.cacheDir = opts.cacheDir
    this.platform = opts.platform
    this.fetch = opts.fetch
    this.verifyChecksum = opts.verifyChecksum ?? false
    this.host = opts.host ?? RELEASE_HOST
  }

  /**
   * ensure returns the absolute path of the executable from the latest
   * release, downloading it only if that release is not cached yet.
   */
  async ensure(): Promise<string> {
    const tag = await this.latestTag()
    const binPath = this.buildBinPath(tag)

    if (this.isCached(tag)) {
      logger.debug(`${this.source.name} ${tag} already cached`)
      return binPath
    }

    logger.info(`Downloading ${this.source.name} ${tag}...`)
    await this.download(tag)
    this.prune(tag)

    return binPath
  }

  /**
   * latestTag follows the "latest release" redirect and returns the tag it
   * lands on.
   */
  async latestTag(): Promise<string> {
    const url = this.latestURL()
    let resp: FetchResponse
    try {
      resp = await this.fetch(url, { method: "HEAD", redirect: "follow" })
    } catch (e) {
      throw new ReleaseResolutionError(
        `failed to resolve latest ${this.source.name} release from ${url}: ${e}`,
        { url, cause: e instanceof Error ? e : undefined },
      )
    }
    if (!resp.ok) {
      throw new ReleaseResolutionError(
        `failed to resolve latest ${this.source.name} release from ${url}: ${resp.status} ${resp.statusText}`,
        { url },
      )
    }

    const tag = path.posix.basename(new URL(resp.url).pathname)
    if (tag === "" || tag === "latest" || tag === "releases") {
      throw new ReleaseResolutionError(
        `${url} did not redirect to a release tag (landed on ${resp.url})`,
        { url },
      )
    }

    return tag
  }

  /**
   * versionDir is the cache directory holding an extracted release. Its name
   * encodes the tag, so a directory under that name means the release is
   * cached.
   */
  versionDir(tag: string): string {
    return path.join(this.cacheDir, `${this.source.name}-${tag}`)
  }

  archiveName(tag: string): string {
    return `${this.source.name}-${tag}-${this.platform.arch}-${this.platform.os}.tar.gz`
  }

  archiveURL(tag: string): string {
    return `${this.host}/${this.source.repository}/releases/download/${tag}/${this.archiveName(tag)}`
  }

  private latestURL(): string {
    return `${this.host}/${this.source.repository}/releases/latest`
  }

  private buildBinPath(tag: string): string {
    return path.resolve(this.versionDir(tag), ...this.source.executable)
  }

  private isCached(tag: string): boolean {
    const stat = fs.statSync(this.versionDir(tag), { throwIfNoEntry: false })

    return stat?.isDirectory() ?? false
  }

  private async download(tag: string): Promise<void> {
    const url = this.archiveURL(tag)
    const versionDir = this.versionDir(tag)

    // Extract next to the cache and move the result in place, so a version
    // directory only ever appears complete.
    fs.mkdirSync(this.cacheDir, { recursive: true })
    const tmpDownloadDir = fs.mkdtempSync(
      path.join(this.cacheDir, `.${this.source.name}-download-`),
    )
    const archivePath = path.join(tmpDownloadDir, this.archiveName(tag))
    const extractedDir = path.join(tmpDownloadDir, path.basename(versionDir))

    try {
      const archiveResp = await this.fetch(url)
      if (!archiveResp.ok) {
        throw new Error(
          `failed to download ${url}: ${archiveResp.status} ${archiveResp.statusText}`,
        )
      }
      if (!archiveResp.body) {
        throw new Error("archive response body is null")
      }

      await pipeline(archiveResp.body, fs.createWriteStream(archivePath))

      if (this.verifyChecksum) {
        await this.checkArchive(archivePath, url)
      }

      await tar.extract({ cwd: tmpDownloadDir, file: archivePath })
      fs.rmSync(archivePath)

      if (!fs.existsSync(extractedDir)) {
        throw new Error(`archive did not contain ${path.basename(versionDir)}`)
      }

      // A stray file under the version name is not a cached release.
      fs.rmSync(versionDir, { recursive: true, force: true })
      fs.renameSync(extractedDir, versionDir)
    } catch (e) {
      if (e instanceof ChecksumMismatchError) {
        throw e
      }

      throw new ReleaseDownloadError(
        `failed to download ${this.source.name} ${tag}: ${e}`,
        {
          url,
          cause: e instanceof Error ? e : undefined,
        },
      )
    } finally {
      fs.rmSync(tmpDownloadDir, { recursive: true, force: true })
    }
  }

  /**
   * checkArchive compares the archive against the `<archive>.sha256` file
   * published alongside it.
   */
  private async checkArchive(archivePath: string, url: string): Promise<void> {
    const checksumURL = `${url}.sha256`
    const checksumResp = await this.fetch(checksumURL)
    if (!checksumResp.ok) {
      throw new Error(`failed to download checksum from ${checksumURL}`)
    }

    const [expected = ""] = (await checksumResp.text()).trim().split(/\s+/)
    const actual = crypto
      .createHash("sha256")
      .update(fs.readFileSync(archivePath))
      .digest("hex")

    if (expected.toLowerCase() !== actual) {
      throw new ChecksumMismatchError({ expected, actual })
    }
  }

  /**
   * prune removes every cached release but the given one. Files and
   * directories that do not carry the tool prefix are left alone.
   */
  private prune(keep: string): void {
    const keepDir = path.basename(this.versionDir(keep))

    for (const entry of fs.readdirSync(this.cacheDir, {
      withFileTypes: true,
    })) {
      if (
        !entry.isDirectory() ||
        entry.name === keepDir ||
        !entry.name.startsWith(`${this.source.name}-`)
      ) {
        continue
      }

      logger.debug(`removing stale ${entry.name}`)
      fs.rmSync(path.join(this.cacheDir, entry.name), {
        recursive: true,
        force: true,
      })
    }
  }
}
