import { toFileComponent } from "../artifacts/artifact-store.js"
import { resultText } from "../command/command-runner.js"
import { parseCommandJson } from "../command/json.js"
import {
  portDetailSchema,
  portListSchema,
  type PortDetail,
  type PortRow,
} from "../schema/openstack.js"
import { getErrorMessage } from "../utils/errors.js"
import { toStringList } from "../utils/type-guards.js"
import { captureCommand, recordFailure, saveArtifact } from "./capture.js"
import type { CollectContext, SecurityGroupSource } from "./types.js"

export interface VmPorts {
  rows: PortRow[]
  /** `port show -f json` results already fetched, keyed by port id (null when unusable). */
  details: Map<string, PortDetail | null>
}

/**
 * Fetches `port show <id> -f json` and stores it as `neutron/port_<id>.json`, pretty-printed
 * when it parses and verbatim otherwise.
 */
export const fetchPortDetail = async (
  ctx: CollectContext,
  portId: string,
): Promise<PortDetail | null> => {
  const result = await ctx.runner.run(["openstack", "port", "show", portId, "-f", "json"])
  const fileName = `port_${toFileComponent(portId)}.json`
  const detail = parseCommandJson(result, portDetailSchema)
  if (!detail.ok) {
    await saveArtifact(
      ctx,
      "ports",
      portId,
      { category: "neutron", fileName, payload: resultText(result) },
      result,
    )
    recordFailure(ctx, "ports", portId, `Could not parse port JSON: ${detail.message}`)
    return null
  }
  await saveArtifact(
    ctx,
    "ports",
    portId,
    { category: "neutron", fileName, payload: JSON.stringify(detail.raw, null, 2) },
    result,
  )
  return detail.data
}

/**
 * Ports attached to the VM, with per-port detail and the network each port belongs to.
 * Returns null when the JSON port listing cannot be used.
 */
export const collectPorts = async (ctx: CollectContext, vmId: string): Promise<VmPorts | null> => {
  ctx.log.info(`Collecting ports for VM ${vmId}`)
  await captureCommand(ctx, "ports", vmId, ["openstack", "port", "list", "--device-id", vmId], {
    category: "neutron",
    fileName: "vm_ports.txt",
  })

  const listing = parseCommandJson(
    await ctx.runner.run(["openstack", "port", "list", "--device-id", vmId, "-f", "json"]),
    portListSchema,
  )
  if (!listing.ok) {
    recordFailure(ctx, "ports", vmId, `Failed to process VM ports or networks: ${listing.message}`)
    return null
  }

  const ports: VmPorts = { rows: listing.data, details: new Map() }
  for (const port of ports.rows) {
    const portId = port.ID
    if (portId) {
      await captureCommand(ctx, "ports", portId, ["openstack", "port", "show", portId], {
        category: "neutron",
        fileName: `port_${toFileComponent(portId)}.txt`,
      })
      if (ctx.variant.savePortDetailJson) {
        ports.details.set(portId, await fetchPortDetail(ctx, portId))
      }
    }

    const networkId = port["Network ID"]
    if (networkId) {
      await captureCommand(ctx, "ports", networkId, ["openstack", "network", "show", networkId], {
        category: "neutron",
        fileName: `network_${toFileComponent(networkId)}.txt`,
      })
    }
  }
  return ports
}

const hasContent = (value: unknown): boolean => {
  if (Array.isArray(value)) {
    return value.length > 0
  }
  return value !== undefined && value !== null && value !== ""
}

/**
 * Security group ids listed on a port row. The column is a list, or a JSON list rendered as a
 * string by some client versions.
 */
export const securityGroupsFromRow = (row: PortRow): string[] => {
  const singular = row["Security Group"]
  const value = hasContent(singular) ? singular : row["Security Groups"]
  if (Array.isArray(value)) {
    return toStringList(value)
  }
  if (typeof value === "string" && value.startsWith("[")) {
    const decoded: unknown = JSON.parse(value)
    return toStringList(decoded)
  }
  return []
}

const idsFromPortList = (ctx: CollectContext, ports: VmPorts): Set<string> => {
  const ids = new Set<string>()
  for (const row of ports.rows) {
    try {
      for (const id of securityGroupsFromRow(row)) {
        ids.add(id)
      }
    } catch (error: unknown) {
      recordFailure(
        ctx,
        "security-groups",
        row.ID ?? null,
        `Could not read security groups of port: ${getErrorMessage(error)}`,
      )
    }
  }
  return ids
}

const idsFromPortDetail = async (ctx: CollectContext, ports: VmPorts): Promise<Set<string>> => {
  const ids = new Set<string>()
  for (const row of ports.rows) {
    const portId = row.ID
    if (!portId) {
      continue
    }
    const detail = ports.details.has(portId)
      ? (ports.details.get(portId) ?? null)
      : await fetchPortDetail(ctx, portId)
    for (const id of toStringList(detail?.security_group_ids)) {
      ids.add(id)
    }
  }
  return ids
}

export const collectSecurityGroups = async (
  ctx: CollectContext,
  ports: VmPorts,
  source: SecurityGroupSource,
): Promise<void> => {
  const ids =
    source === "port-list" ? idsFromPortList(ctx, ports) : await idsFromPortDetail(ctx, ports)

  if (ids.size === 0) {
    ctx.log.warn("No security groups found on any VM ports.")
    return
  }
  ctx.log.info(`Found ${ids.size} unique security groups for VM.`)

  for (const sgId of ids) {
    ctx.log.info(`Fetching security group: ${sgId}`)
    const fileId = toFileComponent(sgId)
    await captureCommand(
      ctx,
      "security-groups",
      sgId,
      ["openstack", "security", "group", "show", sgId],
      { category: "neutron", fileName: `security_group_${fileId}.txt` },
    )
    await captureCommand(
      ctx,
      "security-groups",
      sgId,
      ["openstack", "security", "group", "rule", "list", sgId],
      { category: "neutron", fileName: `security_group_${fileId}_rules.txt` },
    )
  }
}
