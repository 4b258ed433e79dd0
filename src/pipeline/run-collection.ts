import { archiveDirectory } from "../artifacts/archive.js"
import type { ArtifactStore } from "../artifacts/artifact-store.js"
import type { CommandRunner } from "../command/command-runner.js"
import type { EnvConfig } from "../config.js"
import { collectVolumes } from "../collectors/cinder.js"
import { recordFailure, saveArtifact } from "../collectors/capture.js"
import { collectHealthChecks } from "../collectors/health.js"
import { collectStack } from "../collectors/heat.js"
import { collectKeystoneUser } from "../collectors/keystone.js"
import { collectNamespaceEvents, collectPodLogs } from "../collectors/kubernetes.js"
import { collectPorts, collectSecurityGroups } from "../collectors/neutron.js"
import { collectImageAndFlavor, collectServer } from "../collectors/nova.js"
import { checkPrerequisites } from "../collectors/prerequisites.js"
import type {
  CollectContext,
  CollectorLog,
  CollectorVariant,
  SecurityGroupSource,
} from "../collectors/types.js"
import { DiagnosticsReport } from "../diagnostics/report.js"
import { getErrorMessage } from "../utils/errors.js"

export interface CollectionRequest {
  variant: CollectorVariant
  namespace: string | null
  vm?: string
  network?: string
  port?: string
  volume?: string
  stack?: string
  user?: string
  /** Overrides the variant's default when set. */
  securityGroupSource?: SecurityGroupSource
  zip: boolean
}

export interface CollectionDeps {
  runner: CommandRunner
  store: ArtifactStore
  env: EnvConfig
  log: CollectorLog
  now?: () => Date
  pathExists?: (path: string) => Promise<boolean>
  archive?: (dir: string) => Promise<string>
}

export interface CollectionResult {
  report: DiagnosticsReport
  archivePath: string | null
}

// Pod name fragments whose logs accompany a VM investigation.
export const VM_LOG_COMPONENTS = [
  "nova",
  "glance",
  "image",
  "keystone",
  "neutron",
  "cinder",
] as const

const FLAG_LOG_COMPONENTS = [
  { flag: "network", component: "neutron" },
  { flag: "port", component: "neutron" },
  { flag: "volume", component: "cinder" },
] as const

/**
 * One diagnostic run: fatal prerequisite checks, then every collection step in a fixed order.
 * Step failures are recorded in the returned report; only prerequisite failures reject.
 */
export const runCollection = async (
  request: CollectionRequest,
  deps: CollectionDeps,
): Promise<CollectionResult> => {
  const { variant } = request
  const now = deps.now ?? (() => new Date())
  const report = new DiagnosticsReport()
  const ctx: CollectContext = {
    runner: deps.runner,
    store: deps.store,
    report,
    log: deps.log,
    variant,
  }

  await checkPrerequisites(
    { runner: deps.runner, env: deps.env, log: deps.log, pathExists: deps.pathExists },
    variant,
    request.namespace,
  )

  const namespace = variant.kubernetes ? request.namespace : null
  const collectedComponents = new Set<string>()
  const collectLogs = async (components: readonly string[]): Promise<void> => {
    if (!namespace) {
      return
    }
    for (const component of components) {
      if (collectedComponents.has(component)) {
        continue
      }
      collectedComponents.add(component)
      await collectPodLogs(ctx, namespace, component)
    }
  }

  await collectHealthChecks(ctx)
  if (namespace) {
    await collectNamespaceEvents(ctx, namespace)
  }

  if (request.vm) {
    const server = await collectServer(ctx, request.vm)
    if (server) {
      await collectImageAndFlavor(ctx, request.vm, server)
    }
    const ports = await collectPorts(ctx, request.vm)
    if (server) {
      await collectVolumes(ctx, request.vm, server)
    }
    if (ports) {
      await collectSecurityGroups(
        ctx,
        ports,
        request.securityGroupSource ?? variant.securityGroupSource,
      )
    }
    await collectLogs(VM_LOG_COMPONENTS)
  }

  // These flags never trigger a lookup of the resource they name; kept as-is and reported.
  for (const { flag, component } of FLAG_LOG_COMPONENTS) {
    const value = request[flag]
    if (!value) {
      continue
    }
    const effect = namespace ? `only collects ${component} pod logs` : "has no effect"
    report.addNote(`--${flag} ${value} ${effect}; no ${flag}-specific lookup is made`)
    await collectLogs([component])
  }

  if (request.stack) {
    await collectStack(ctx, request.stack)
    await collectLogs(["heat"])
  }

  if (request.user) {
    await collectKeystoneUser(ctx, request.user)
    await collectLogs(["keystone"])
  }

  await saveArtifact(ctx, "summary", null, {
    fileName: "summary.txt",
    payload: report.toSummaryText({
      generatedAt: now(),
      variantLabel: variant.label,
      namespace,
    }),
  })
  await saveArtifact(ctx, "summary", null, {
    fileName: "diagnostics.json",
    payload: `${JSON.stringify(report.toJSON(), null, 2)}\n`,
  })

  let archivePath: string | null = null
  if (request.zip) {
    try {
      archivePath = await (deps.archive ?? archiveDirectory)(deps.store.rootDir)
      deps.log.info(`Output archived at: ${archivePath}`)
    } catch (error: unknown) {
      recordFailure(ctx, "archive", deps.store.rootDir, getErrorMessage(error))
    }
  }

  return { report, archivePath }
}
