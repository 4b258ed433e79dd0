export const ARTIFACT_CATEGORIES = [
  "health",
  "logs",
  "describe",
  "events",
  "nova",
  "neutron",
  "cinder",
  "heat",
  "keystone",
  "glance",
] as const

export type ArtifactCategory = (typeof ARTIFACT_CATEGORIES)[number]

export interface ArtifactSpec {
  /** Subdirectory of the run directory; omitted for top-level files such as summary.txt. */
  category?: ArtifactCategory
  fileName: string
  payload: string
}

export interface StoredFile {
  /** Path relative to the run directory, with forward slashes. */
  path: string
  size: number
}

export interface ArtifactStore {
  readonly rootDir: string
  write(artifact: ArtifactSpec): Promise<string>
  list(): Promise<StoredFile[]>
}

/**
 * Makes an identifier safe to embed in a file name. The encoding is reversible, so distinct ids
 * never share a file: UUIDs and plain names pass through, anything else is percent-encoded.
 * `_` is encoded too because it joins components (`<component>_<pod>_<container>.log`).
 */
export const toFileComponent = (value: string): string => {
  const encoded = encodeURIComponent(value).replaceAll("_", "%5F")
  if (!encoded) {
    return "%"
  }
  if (/^\.+$/.test(encoded)) {
    return encoded.replaceAll(".", "%2E")
  }
  return encoded
}
