import assert from "assert"
import * as crypto from "crypto"
import * as fs from "fs"
import * as path from "path"
import { after, afterEach, before, beforeEach, describe, it } from "mocha"

import {
  ChecksumMismatchError,
  ReleaseDownloadError,
  ReleaseResolutionError,
} from "../../common/errors/index.js"
import {
  binaryenArchive,
  FakeFetch,
  FakeRoute,
  tmpDir,
} from "../../test/fakes.js"
import { BINARYEN, getWasmOpt } from "../binaryen.js"
import { ReleaseFetcher } from "../release.js"

const TAG = "version_999"
const LATEST_URL = "https://github.com/WebAssembly/binaryen/releases/latest"
const TAG_URL = `https://github.com/WebAssembly/binaryen/releases/tag/${TAG}`
const ARCHIVE_URL = `https://github.com/WebAssembly/binaryen/releases/download/${TAG}/binaryen-${TAG}-x86_64-linux.tar.gz`

const platform = { arch: "x86_64", os: "linux" } as const

function cachedVersions(cacheDir: string): string[] {
  return fs
    .readdirSync(cacheDir, { withFileTypes: true })
    .filter(
      (entry) => entry.isDirectory() && entry.name.startsWith("binaryen-"),
    )
    .map((entry) => entry.name)
    .sort()
}

describe("ReleaseFetcher", function () {
  let fixtures: string
  let archive: Buffer
  let cacheDir: string

  before(async function () {
    fixtures = tmpDir()
    archive = await binaryenArchive(fixtures, TAG)
  })

  after(function () {
    fs.rmSync(fixtures, { recursive: true, force: true })
  })

  beforeEach(function () {
    cacheDir = tmpDir()
  })

  afterEach(function () {
    fs.rmSync(cacheDir, { recursive: true, force: true })
  })

  function fetcher(
    routes: Record<string, FakeRoute>,
    verifyChecksum = false,
  ): { fetcher: ReleaseFetcher; fake: FakeFetch } {
    const fake = new FakeFetch(routes)
    return {
      fake,
      fetcher: new ReleaseFetcher(BINARYEN, {
        cacheDir,
        platform,
        fetch: fake.fetch,
        verifyChecksum,
      }),
    }
  }

  it("Should name archives after the tag and platform", function () {
    const { fetcher: f } = fetcher({})

    assert.strictEqual(
      f.archiveName(TAG),
      `binaryen-${TAG}-x86_64-linux.tar.gz`,
    )
    assert.strictEqual(f.archiveURL(TAG), ARCHIVE_URL)
    assert.strictEqual(
      f.versionDir(TAG),
      path.join(cacheDir, `binaryen-${TAG}`),
    )
  })

  it("Should read the latest tag from the redirect target", async function () {
    const { fetcher: f, fake } = fetcher({ [LATEST_URL]: { url: TAG_URL } })

    assert.strictEqual(await f.latestTag(), TAG)
    assert.deepStrictEqual(fake.calls, [{ url: LATEST_URL, method: "HEAD" }])
  })

  it("Should fail if the latest release cannot be resolved", async function () {
    const { fetcher: f } = fetcher({ [LATEST_URL]: { status: 500 } })

    await assert.rejects(f.latestTag(), (e: unknown) => {
      assert.ok(e instanceof ReleaseResolutionError)
      assert.strictEqual(e.url, LATEST_URL)
      return true
    })
  })

  it("Should fail if the release host cannot be reached", async function () {
    const cause = new Error("getaddrinfo ENOTFOUND github.com")
    const { fetcher: f } = fetcher({ [LATEST_URL]: { error: cause } })

    await assert.rejects(f.ensure(), (e: unknown) => {
      assert.ok(e instanceof ReleaseResolutionError)
      assert.strictEqual(e.url, LATEST_URL)
      assert.strictEqual(e.cause, cause)
      assert.strictEqual(
        e.message,
        `failed to resolve latest binaryen release from ${LATEST_URL}: Error: getaddrinfo ENOTFOUND github.com`,
      )
      return true
    })
    assert.deepStrictEqual(fs.readdirSync(cacheDir), [])
  })

  it("Should fail if the latest release does not redirect to a tag", async function () {
    const { fetcher: f } = fetcher({ [LATEST_URL]: {} })

    await assert.rejects(f.latestTag(), ReleaseResolutionError)
  })

  it("Should reuse a cached release without downloading", async function () {
    fs.mkdirSync(path.join(cacheDir, `binaryen-${TAG}`, "bin"), {
      recursive: true,
    })
    fs.mkdirSync(path.join(cacheDir, "binaryen-version_100"))
    const { fetcher: f, fake } = fetcher({ [LATEST_URL]: { url: TAG_URL } })

    const binPath = await f.ensure()

    assert.strictEqual(
      binPath,
      path.resolve(cacheDir, `binaryen-${TAG}`, "bin", "wasm-opt"),
    )
    assert.deepStrictEqual(fake.calls, [{ url: LATEST_URL, method: "HEAD" }])
    // Pruning only follows a download.
    assert.deepStrictEqual(cachedVersions(cacheDir), [
      "binaryen-version_100",
      `binaryen-${TAG}`,
    ])
  })

  it("Should download, extract and keep only the latest release", async function () {
    fs.mkdirSync(path.join(cacheDir, "binaryen-version_100", "bin"), {
      recursive: true,
    })
    fs.mkdirSync(path.join(cacheDir, "binaryen-version_101"))
    fs.mkdirSync(path.join(cacheDir, "notes"))
    fs.writeFileSync(path.join(cacheDir, "binaryen-readme.txt"), "keep me")
    const { fetcher: f, fake } = fetcher({
      [LATEST_URL]: { url: TAG_URL },
      [ARCHIVE_URL]: { body: archive },
    })

    const binPath = await f.ensure()

    assert.strictEqual(
      binPath,
      path.resolve(cacheDir, `binaryen-${TAG}`, "bin", "wasm-opt"),
    )
    assert.strictEqual(fs.readFileSync(binPath, "utf8"), "#!/bin/sh\nexit 0\n")
    assert.deepStrictEqual(fake.calls, [
      { url: LATEST_URL, method: "HEAD" },
      { url: ARCHIVE_URL, method: "GET" },
    ])
    assert.deepStrictEqual(cachedVersions(cacheDir), [`binaryen-${TAG}`])
    assert.deepStrictEqual(fs.readdirSync(cacheDir).sort(), [
      "binaryen-readme.txt",
      `binaryen-${TAG}`,
      "notes",
    ])
  })

  it("Should not take a file under the version name for a cached release", async function () {
    fs.writeFileSync(path.join(cacheDir, `binaryen-${TAG}`), "not a release")
    const { fetcher: f, fake } = fetcher({
      [LATEST_URL]: { url: TAG_URL },
      [ARCHIVE_URL]: { body: archive },
    })

    const binPath = await f.ensure()

    assert.deepStrictEqual(fake.calls, [
      { url: LATEST_URL, method: "HEAD" },
      { url: ARCHIVE_URL, method: "GET" },
    ])
    assert.strictEqual(fs.readFileSync(binPath, "utf8"), "#!/bin/sh\nexit 0\n")
    assert.deepStrictEqual(cachedVersions(cacheDir), [`binaryen-${TAG}`])
  })

  it("Should fail if the archive cannot be downloaded", async function () {
    fs.mkdirSync(path.join(cacheDir, "binaryen-version_100"))
    const { fetcher: f } = fetcher({ [LATEST_URL]: { url: TAG_URL } })

    await assert.rejects(f.ensure(), (e: unknown) => {
      assert.ok(e instanceof ReleaseDownloadError)
      assert.strictEqual(e.url, ARCHIVE_URL)
      return true
    })
    assert.deepStrictEqual(fs.readdirSync(cacheDir), ["binaryen-version_100"])
  })

  it("Should fail if the archive is not a binaryen release", async function () {
    const other = await binaryenArchive(fixtures, "version_1")
    const { fetcher: f } = fetcher({
      [LATEST_URL]: { url: TAG_URL },
      [ARCHIVE_URL]: { body: other },
    })

    await assert.rejects(
      f.ensure(),
      /archive did not contain binaryen-version_999/,
    )
    assert.deepStrictEqual(fs.readdirSync(cacheDir), [])
  })

  it("Should accept an archive matching its published checksum", async function () {
    const digest = crypto.createHash("sha256").update(archive).digest("hex")
    const { fetcher: f, fake } = fetcher(
      {
        [LATEST_URL]: { url: TAG_URL },
        [ARCHIVE_URL]: { body: archive },
        [`${ARCHIVE_URL}.sha256`]: {
          body: `${digest}  binaryen-${TAG}-x86_64-linux.tar.gz\n`,
        },
      },
      true,
    )

    const binPath = await f.ensure()

    assert.ok(fs.existsSync(binPath))
    assert.deepStrictEqual(
      fake.calls.map((call) => call.url),
      [LATEST_URL, ARCHIVE_URL, `${ARCHIVE_URL}.sha256`],
    )
  })

  it("Should reject an archive not matching its published checksum", async function () {
    const { fetcher: f } = fetcher(
      {
        [LATEST_URL]: { url: TAG_URL },
        [ARCHIVE_URL]: { body: archive },
        [`${ARCHIVE_URL}.sha256`]: { body: "deadbeef  archive.tar.gz\n" },
      },
      true,
    )

    await assert.rejects(f.ensure(), (e: unknown) => {
      assert.ok(e instanceof ChecksumMismatchError)
      assert.strictEqual(e.expected, "deadbeef")
      return true
    })
    assert.deepStrictEqual(fs.readdirSync(cacheDir), [])
  })
})

describe("getWasmOpt", function () {
  it("Should return the configured wasm-opt without any request", async function () {
    const fake = new FakeFetch({})

    const wasmOpt = await getWasmOpt(
      {
        wasmOpt: "/opt/binaryen/bin/wasm-opt",
        cacheDir: "/unused",
        verifyChecksum: false,
      },
      {
        fetch: fake.fetch,
        platform: () => {
          throw new Error("platform should not be resolved")
        },
      },
    )

    assert.strictEqual(wasmOpt, "/opt/binaryen/bin/wasm-opt")
    assert.deepStrictEqual(fake.calls, [])
  })

  it("Should fetch binaryen for the host platform", async function () {
    const cacheDir = tmpDir()
    try {
      fs.mkdirSync(path.join(cacheDir, `binaryen-${TAG}`))
      const fake = new FakeFetch({ [LATEST_URL]: { url: TAG_URL } })

      const wasmOpt = await getWasmOpt(
        { cacheDir, verifyChecksum: false },
        { fetch: fake.fetch, platform: () => platform },
      )

      assert.strictEqual(
        wasmOpt,
        path.resolve(cacheDir, `binaryen-${TAG}`, "bin", "wasm-opt"),
      )
    } finally {
      fs.rmSync(cacheDir, { recursive: true, force: true })
    }
  })
})
