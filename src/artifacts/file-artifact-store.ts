import { mkdir, readdir, stat, writeFile } from "node:fs/promises"
import { dirname, join, relative, sep } from "node:path"

import type { ArtifactSpec, ArtifactStore, StoredFile } from "./artifact-store.js"

export interface FileArtifactStoreConfig {
  rootDir: string
}

const walk = async (dir: string): Promise<string[]> => {
  const entries = await readdir(dir, { withFileTypes: true })
  const files: string[] = []
  for (const entry of entries) {
    const fullPath = join(dir, entry.name)
    if (entry.isDirectory()) {
      files.push(...(await walk(fullPath)))
    } else if (entry.isFile()) {
      files.push(fullPath)
    }
  }
  return files
}

export class FileArtifactStore implements ArtifactStore {
  readonly rootDir: string

  constructor(config: FileArtifactStoreConfig) {
    this.rootDir = config.rootDir
  }

  private resolvePath(artifact: ArtifactSpec): string {
    return artifact.category
      ? join(this.rootDir, artifact.category, artifact.fileName)
      : join(this.rootDir, artifact.fileName)
  }

  async write(artifact: ArtifactSpec): Promise<string> {
    const targetFile = this.resolvePath(artifact)
    await mkdir(dirname(targetFile), { recursive: true })
    await writeFile(targetFile, artifact.payload, "utf-8")
    return targetFile
  }

  async list(): Promise<StoredFile[]> {
    let files: string[]
    try {
      files = await walk(this.rootDir)
    } catch (error: unknown) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return []
      }
      throw error
    }

    const stored: StoredFile[] = []
    for (const file of files) {
      const fileStat = await stat(file)
      stored.push({ path: relative(this.rootDir, file).split(sep).join("/"), size: fileStat.size })
    }
    return stored.sort((a, b) => a.path.localeCompare(b.path))
  }
}
