import { mkdir, realpath, symlink, truncate, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { buildManifest, calculateMetadata, collectFiles } from "../src/collect"
import { MAX_ARCHIVE_ENTRY_SIZE } from "../src/constants"
import { ArchiveError, FilesystemError } from "../src/error"
import { createTempProject, removeTempDir, toArray } from "./support/test-helpers"
import type { CollectedFile } from "../src/collect"

const TREE = {
  "index.html": `<h1>hi</h1>`,
  "style.css": `body{}`,
  "node_modules/x.js": `x`,
  "about/index.html": `about`,
  "about.txt": `t`,
  ".surgeignore": `*.map\n`,
  "app.js.map": `m`,
  "sub/.surgeignore": `secret.txt\n`,
  "sub/secret.txt": `s`,
  "sub/public.txt": `p`,
  "empty.txt": ``,
}

const paths = (files: Array<CollectedFile>) => files.map((file) => file.path)

describe(`collectFiles`, () => {
  let root: string
  const cleanup: Array<string> = []

  beforeEach(async () => {
    root = await createTempProject(TREE)
    cleanup.push(root)
  })

  afterEach(async () => {
    await Promise.all(cleanup.splice(0).map((dir) => removeTempDir(dir)))
  })

  it(`should yield non-ignored files in full-path lexicographic order`, async () => {
    const files = await toArray(collectFiles(root))

    expect(paths(files)).toEqual([
      `.surgeignore`,
      `about.txt`,
      `about/index.html`,
      `empty.txt`,
      `index.html`,
      `style.css`,
      `sub/.surgeignore`,
      `sub/public.txt`,
    ])
    expect(paths(files)).toEqual([...paths(files)].sort())
  })

  it(`should report size and absolute path for each file`, async () => {
    const files = await toArray(collectFiles(root))
    const index = files.find((file) => file.path === `index.html`)
    const empty = files.find((file) => file.path === `empty.txt`)

    expect(index?.size).toBe(11)
    expect(index?.absolutePath).toBe(join(root, `index.html`))
    expect(empty?.size).toBe(0)
  })

  it(`should apply caller patterns after the defaults`, async () => {
    const files = await toArray(collectFiles(root, { ignore: [`*.txt`] }))
    expect(paths(files)).toEqual([
      `.surgeignore`,
      `about/index.html`,
      `index.html`,
      `style.css`,
      `sub/.surgeignore`,
    ])
  })

  it(`should re-include a file under a dir/** rule`, async () => {
    const project = await createTempProject({
      ".surgeignore": `assets/**\n!assets/keep.txt\n`,
      "assets/keep.txt": `k`,
      "assets/logo.png": `png`,
      "index.html": `i`,
    })
    cleanup.push(project)

    const files = await toArray(collectFiles(project))
    expect(paths(files)).toEqual([`.surgeignore`, `assets/keep.txt`, `index.html`])
  })

  it(`should skip ignore files when disabled`, async () => {
    const files = await toArray(collectFiles(root, { ignoreFiles: false }))
    expect(paths(files)).toContain(`app.js.map`)
    expect(paths(files)).toContain(`sub/secret.txt`)
    expect(paths(files)).not.toContain(`node_modules/x.js`)
  })

  it(`should follow links to files inside the root only`, async () => {
    const outside = await createTempProject({ "secret.txt": `outside` })
    cleanup.push(outside)

    await symlink(join(root, `index.html`), join(root, `link.html`))
    await symlink(join(outside, `secret.txt`), join(root, `outside.txt`))
    await symlink(join(root, `missing.txt`), join(root, `dangling.txt`))
    await symlink(join(root, `about`), join(root, `about-link`))

    const files = await toArray(collectFiles(root))
    const link = files.find((file) => file.path === `link.html`)

    expect(link?.absolutePath).toBe(await realpath(join(root, `index.html`)))
    expect(link?.size).toBe(11)
    expect(paths(files)).not.toContain(`outside.txt`)
    expect(paths(files)).not.toContain(`dangling.txt`)
    expect(paths(files).some((path) => path.startsWith(`about-link`))).toBe(
      false
    )
  })

  it(`should fail with FilesystemError for a missing root`, async () => {
    await expect(
      toArray(collectFiles(join(root, `does-not-exist`)))
    ).rejects.toBeInstanceOf(FilesystemError)
  })

  it(`should fail with FilesystemError when the root is a file`, async () => {
    await expect(
      toArray(collectFiles(join(root, `index.html`)))
    ).rejects.toThrow(/is not a directory/)
  })

  it(`should stop walking as soon as the consumer stops`, async () => {
    const iterator = collectFiles(root)
    const first = await iterator.next()
    expect(first.done).toBe(false)
    if (!first.done) expect(first.value.path).toBe(`.surgeignore`)
    const done = await iterator.return(undefined)
    expect(done.done).toBe(true)
  })
})

describe(`buildManifest`, () => {
  const cleanup: Array<string> = []

  afterEach(async () => {
    await Promise.all(cleanup.splice(0).map((dir) => removeTempDir(dir)))
  })

  it(`should total the files to publish`, async () => {
    const root = await createTempProject(TREE)
    cleanup.push(root)

    const manifest = await buildManifest(root)

    expect(manifest.root).toBe(root)
    expect(manifest.fileCount).toBe(8)
    expect(manifest.files).toHaveLength(8)
    expect(manifest.projectSize).toBe(41)
  })

  it(`should reject a project that is empty after filtering`, async () => {
    const root = await createTempProject({ "node_modules/a.js": `a` })
    cleanup.push(root)

    const error = await buildManifest(root).catch((err: unknown) => err)
    expect(error).toBeInstanceOf(FilesystemError)
    expect(error).toHaveProperty(`code`, `FILESYSTEM_ERROR`)
    expect(String(error)).toContain(`Nothing to publish`)
  })

  it(`should reject a file larger than a tar entry can hold`, async () => {
    const root = await createTempProject({ "index.html": `i` })
    cleanup.push(root)
    await writeFile(join(root, `huge.bin`), ``)
    await truncate(join(root, `huge.bin`), MAX_ARCHIVE_ENTRY_SIZE + 1)

    const error = await buildManifest(root).catch((err: unknown) => err)
    expect(error).toBeInstanceOf(ArchiveError)
    expect(error).toHaveProperty(`code`, `ARCHIVE_ERROR`)
    expect(error).toHaveProperty(`path`, `huge.bin`)
  })

  it(`should reject a project with no files at all`, async () => {
    const root = await createTempProject({})
    cleanup.push(root)
    await mkdir(join(root, `empty-dir`))

    await expect(buildManifest(root)).rejects.toBeInstanceOf(FilesystemError)
  })
})

describe(`calculateMetadata`, () => {
  it(`should count files and bytes after ignore filtering`, async () => {
    const root = await createTempProject({
      "a.txt": `abc`,
      "b/c.txt": `de`,
      "node_modules/skip.js": `ignored`,
    })
    await writeFile(join(root, `.DS_Store`), `junk`)

    try {
      expect(await calculateMetadata(root)).toEqual({
        fileCount: 2,
        projectSize: 5,
      })
    } finally {
      await removeTempDir(root)
    }
  })
})
