import { isRecord } from "./type-guards.js"

const EMBEDDED_UUID = /\(([a-f0-9-]{36})\)/

/**
 * Resolves the resource id behind a field of `openstack server show -f json`.
 *
 * Depending on the client version, `image` and `flavor` come back as a mapping with an `id`
 * key or as a display string such as `cirros (11111111-1111-1111-1111-111111111111)`.
 * Strings without an embedded UUID are returned trimmed, as they are usually a bare id or name.
 */
export const extractId = (raw: unknown): string | null => {
  if (isRecord(raw)) {
    const id = raw["id"]
    return typeof id === "string" ? id : null
  }
  if (typeof raw === "string") {
    const match = EMBEDDED_UUID.exec(raw)
    return match?.[1] ?? raw.trim()
  }
  return null
}
