import { createWriteStream } from "node:fs"
import { basename, dirname, join, resolve } from "node:path"
import { pipeline } from "node:stream/promises"

import archiver from "archiver"

/** Zip file placed beside `dir`, named after it. */
export const archivePathFor = (dir: string): string => {
  const absolute = resolve(dir)
  return join(dirname(absolute), `${basename(absolute)}.zip`)
}

/**
 * Compresses the contents of `dir` (entries relative to `dir`) into `<dir>.zip` and returns
 * the archive path. Entries are streamed to disk one file at a time; an existing archive is
 * replaced.
 */
export const archiveDirectory = async (dir: string): Promise<string> => {
  const zipPath = archivePathFor(dir)
  const archive = archiver("zip")
  archive.directory(resolve(dir), false)
  await Promise.all([pipeline(archive, createWriteStream(zipPath)), archive.finalize()])
  return zipPath
}
