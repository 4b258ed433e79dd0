import { Command } from "commander"
import { z } from "zod"

import { ALL_VARIANT_IDS, isVariantId } from "./collectors/registry.js"
import type { SecurityGroupSource, VariantId } from "./collectors/types.js"

export interface CliOptions {
  variant: VariantId
  namespace: string | null
  output: string | null
  vm?: string
  network?: string
  port?: string
  volume?: string
  stack?: string
  user?: string
  zip: boolean
  securityGroups?: SecurityGroupSource
  verbose: boolean
  plain: boolean
}

export const createProgram = (): Command => {
  const program = new Command()
  program
    .name("openstack-debug-collector")
    .description("Collect OpenStack (and Kubernetes) diagnostic output for offline inspection")
    .option(
      "--variant <id>",
      `Collector variant: ${ALL_VARIANT_IDS.join(" ")}`,
      "standalone",
    )
    .option("--namespace <namespace>", "Kubernetes namespace (kubernetes variant only)")
    .option("--output <dir>", "Output directory (default: <prefix>-YYYYMMDD-HHMMSS)")
    .option("--vm <id>", "VM ID")
    .option("--network <id>", "Network ID")
    .option("--port <id>", "Port ID")
    .option("--volume <id>", "Volume ID")
    .option("--stack <id>", "Heat Stack ID")
    .option("--user <id>", "Keystone User ID or Name")
    .option("--zip", "Zip output", false)
    .option(
      "--security-groups <source>",
      "Where security group ids are read from: port-list port-detail",
    )
    .option("--verbose", "Print every command as it runs", false)
    .option("--plain", "Plain output without colours or spinners", false)
  return program
}

const optionalId = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim()
    return trimmed ? trimmed : undefined
  })

const cliOptionsSchema = z
  .object({
    variant: z.custom<VariantId>(
      (value) => typeof value === "string" && isVariantId(value),
      `Unknown variant. Use one of: ${ALL_VARIANT_IDS.join(" ")}`,
    ),
    namespace: optionalId,
    output: optionalId,
    vm: optionalId,
    network: optionalId,
    port: optionalId,
    volume: optionalId,
    stack: optionalId,
    user: optionalId,
    zip: z.boolean().default(false),
    securityGroups: z.enum(["port-list", "port-detail"]).optional(),
    verbose: z.boolean().default(false),
    plain: z.boolean().default(false),
  })
  .superRefine((options, ctx) => {
    if (options.variant === "kubernetes" && !options.namespace) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["namespace"],
        message: "--namespace is required for the kubernetes variant",
      })
    }
    if (options.variant !== "kubernetes" && options.namespace) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["namespace"],
        message: `--namespace is not used by the ${options.variant} variant`,
      })
    }
  })

export const parseOptions = (program: Command): CliOptions => {
  const opts = program.opts<Record<string, unknown>>()
  const raw = {
    variant: opts["variant"] ?? "standalone",
    namespace: opts["namespace"],
    output: opts["output"],
    vm: opts["vm"],
    network: opts["network"],
    port: opts["port"],
    volume: opts["volume"],
    stack: opts["stack"],
    user: opts["user"],
    zip: opts["zip"] ?? false,
    securityGroups: opts["securityGroups"],
    verbose: opts["verbose"] ?? false,
    plain: opts["plain"] ?? false,
  }
  const parsed = cliOptionsSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const path = issue.path.join(".")
    throw new Error(`Invalid option${path ? ` (${path})` : ""}: ${issue.message}`)
  }
  const { namespace, output, ...rest } = parsed.data
  return { ...rest, namespace: namespace ?? null, output: output ?? null }
}

const pad = (value: number): string => String(value).padStart(2, "0")

export const timestampSuffix = (now: Date): string => {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  return `${date}-${time}`
}

export const defaultOutputDir = (prefix: string, now: Date): string =>
  `${prefix}-${timestampSuffix(now)}`
