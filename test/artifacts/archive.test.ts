import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import AdmZip from "adm-zip"
import { afterEach, beforeEach, describe, expect, it } from "vitest"

import { archiveDirectory, archivePathFor } from "../../src/artifacts/archive.js"
import { FileArtifactStore } from "../../src/artifacts/file-artifact-store.js"

describe("archiveDirectory", () => {
  let workDir: string

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "osdebug-archive-"))
  })

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true })
  })

  it("places the zip beside the directory, named after it", () => {
    expect(archivePathFor(join(workDir, "debug-output-1"))).toBe(
      join(workDir, "debug-output-1.zip"),
    )
    expect(archivePathFor(join(workDir, "debug-output-1", ""))).toBe(
      join(workDir, "debug-output-1.zip"),
    )
  })

  it("replaces an archive left by an earlier run", async () => {
    const outputDir = join(workDir, "debug-output-2")
    await mkdir(outputDir, { recursive: true })
    await writeFile(join(outputDir, "summary.txt"), "Debug Summary\n")
    await writeFile(join(workDir, "debug-output-2.zip"), "stale bytes that are not a zip")

    const zipPath = await archiveDirectory(outputDir)

    const entries = new AdmZip(zipPath).getEntries().filter((entry) => !entry.isDirectory)
    expect(entries.map((entry) => entry.entryName)).toEqual(["summary.txt"])
    expect(entries[0]?.getData().toString("utf-8")).toBe("Debug Summary\n")
  })

  it("reproduces every file byte for byte when extracted", async () => {
    const outputDir = join(workDir, "debug-output-1")
    const files: Record<string, Buffer> = {
      "summary.txt": Buffer.from("Debug Summary\n"),
      "nova/server_show.txt": Buffer.from("| status | ACTIVE |\n"),
      "neutron/vm_ports.txt": Buffer.from("[]"),
      "logs/nova_nova-api-0_nova-api.log": Buffer.from([0x00, 0xff, 0x10, 0x0a, 0xc3, 0xa9]),
    }
    for (const [path, content] of Object.entries(files)) {
      const target = join(outputDir, path)
      await mkdir(join(target, ".."), { recursive: true })
      await writeFile(target, content)
    }

    const zipPath = await archiveDirectory(outputDir)
    expect(zipPath).toBe(join(workDir, "debug-output-1.zip"))

    const extractDir = join(workDir, "extracted")
    new AdmZip(zipPath).extractAllTo(extractDir, true)

    const extracted = await new FileArtifactStore({ rootDir: extractDir }).list()
    expect(extracted.map((file) => file.path)).toEqual([
      "logs/nova_nova-api-0_nova-api.log",
      "neutron/vm_ports.txt",
      "nova/server_show.txt",
      "summary.txt",
    ])
    for (const [path, content] of Object.entries(files)) {
      expect((await readFile(join(extractDir, path))).equals(content)).toBe(true)
    }
  })
})
