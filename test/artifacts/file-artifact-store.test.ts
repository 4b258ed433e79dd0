import { mkdtemp, readdir, readFile, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { afterEach, beforeEach, describe, expect, it } from "vitest"

import { toFileComponent } from "../../src/artifacts/artifact-store.js"
import { FileArtifactStore } from "../../src/artifacts/file-artifact-store.js"

describe("FileArtifactStore", () => {
  let rootDir: string

  beforeEach(async () => {
    rootDir = await mkdtemp(join(tmpdir(), "osdebug-store-"))
  })

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true })
  })

  it("creates the category directory and writes the payload", async () => {
    const store = new FileArtifactStore({ rootDir: join(rootDir, "run") })

    const written = await store.write({
      category: "nova",
      fileName: "server_show.txt",
      payload: "| id | vm-1 |",
    })

    expect(written).toBe(join(rootDir, "run", "nova", "server_show.txt"))
    expect(await readFile(written, "utf-8")).toBe("| id | vm-1 |")
  })

  it("writes top-level files when no category is given", async () => {
    const store = new FileArtifactStore({ rootDir })
    await store.write({ fileName: "summary.txt", payload: "Debug Summary" })
    expect(await readFile(join(rootDir, "summary.txt"), "utf-8")).toBe("Debug Summary")
  })

  it("is idempotent for repeated writes of the same content", async () => {
    const store = new FileArtifactStore({ rootDir })
    const artifact = { category: "heat" as const, fileName: "stack_show.txt", payload: "stack" }

    await store.write(artifact)
    const once = await store.list()
    await store.write(artifact)
    const twice = await store.list()

    expect(twice).toEqual(once)
    expect(await readdir(join(rootDir, "heat"))).toEqual(["stack_show.txt"])
    expect(await readFile(join(rootDir, "heat", "stack_show.txt"), "utf-8")).toBe("stack")
  })

  it("overwrites existing files", async () => {
    const store = new FileArtifactStore({ rootDir })
    await store.write({ category: "keystone", fileName: "user_show.txt", payload: "old" })
    await store.write({ category: "keystone", fileName: "user_show.txt", payload: "new" })
    expect(await readFile(join(rootDir, "keystone", "user_show.txt"), "utf-8")).toBe("new")
  })

  it("lists files relative to the root, sorted, with sizes", async () => {
    const store = new FileArtifactStore({ rootDir })
    await store.write({ category: "neutron", fileName: "vm_ports.txt", payload: "" })
    await store.write({ category: "cinder", fileName: "attached_volumes.txt", payload: "[]" })
    await store.write({ fileName: "summary.txt", payload: "abc" })

    expect(await store.list()).toEqual([
      { path: "cinder/attached_volumes.txt", size: 2 },
      { path: "neutron/vm_ports.txt", size: 0 },
      { path: "summary.txt", size: 3 },
    ])
  })

  it("lists nothing for a root that does not exist yet", async () => {
    const store = new FileArtifactStore({ rootDir: join(rootDir, "missing") })
    expect(await store.list()).toEqual([])
  })
})

describe("toFileComponent", () => {
  it("keeps ids made of unreserved characters", () => {
    expect(toFileComponent("0b5c1a4e-7d2f-4b53-9a57-9f1d1f0c2a11")).toBe(
      "0b5c1a4e-7d2f-4b53-9a57-9f1d1f0c2a11",
    )
    expect(toFileComponent("web.server-1")).toBe("web.server-1")
  })

  it("encodes separators so a name never leaves its directory", () => {
    expect(toFileComponent("../etc/passwd")).toBe("..%2Fetc%2Fpasswd")
    expect(toFileComponent("..")).toBe("%2E%2E")
    expect(toFileComponent("")).toBe("%")
  })

  it("gives distinct ids distinct names", () => {
    const ids = ["data volume", "data_volume", "data%20volume", "a/b", "a_b", " a", "a", "."]
    const names = ids.map(toFileComponent)

    expect(names).toEqual([
      "data%20volume",
      "data%5Fvolume",
      "data%2520volume",
      "a%2Fb",
      "a%5Fb",
      "%20a",
      "a",
      "%2E",
    ])
    expect(new Set(names).size).toBe(ids.length)
  })
})
