import type { ArtifactCategory, ArtifactStore } from "../artifacts/artifact-store.js"
import type { CommandArgs, CommandRunner } from "../command/command-runner.js"
import type { DiagnosticsReport } from "../diagnostics/report.js"

export type VariantId = "kubernetes" | "standalone"

/**
 * Where security group ids come from: the `Security Groups` column of the port listing, or
 * `security_group_ids` of each port's own detail. The two can disagree when the listing is
 * served from a stale cache, so the choice is explicit.
 */
export type SecurityGroupSource = "port-list" | "port-detail"

export interface HealthCheck {
  name: string
  args: CommandArgs
}

export interface CollectorVariant {
  readonly id: VariantId
  readonly label: string
  /** Prefix of the default output directory name. */
  readonly outputPrefix: string
  /** Control plane runs in a Kubernetes namespace; enables events and pod logs. */
  readonly kubernetes: boolean
  readonly healthChecks: readonly HealthCheck[]
  /** Extra arguments for the human-readable `openstack server show`. */
  readonly serverShowArgs: readonly string[]
  /** Also store `port show -f json` for every port of the VM. */
  readonly savePortDetailJson: boolean
  readonly securityGroupSource: SecurityGroupSource
}

export interface CollectorLog {
  info(message: string): void
  warn(message: string): void
  error(message: string): void
  debug(message: string): void
}

export interface CollectContext {
  runner: CommandRunner
  store: ArtifactStore
  report: DiagnosticsReport
  log: CollectorLog
  variant: CollectorVariant
}

export interface ArtifactTarget {
  category: ArtifactCategory
  fileName: string
}

export const silentLog: CollectorLog = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
}
