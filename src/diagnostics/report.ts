// ── Error model ─────────────────────────────────────────────────────

export type CollectionStep =
  | "health"
  | "events"
  | "pod-logs"
  | "nova"
  | "image-flavor"
  | "ports"
  | "volumes"
  | "security-groups"
  | "heat"
  | "keystone"
  | "summary"
  | "archive"

export interface StepFailure {
  step: CollectionStep
  /** Resource the step was working on (VM id, port id, namespace...), if any. */
  target: string | null
  message: string
}

export interface ArtifactRecord {
  /** Path relative to the run directory. */
  path: string
  command: string | null
  ok: boolean
}

export interface SummaryHeader {
  generatedAt: Date
  variantLabel: string
  namespace: string | null
}

export interface DiagnosticsReportJson {
  artifacts: ArtifactRecord[]
  failures: StepFailure[]
  notes: string[]
}

/**
 * Everything a run produced or failed to produce. Non-fatal failures end up here instead of
 * aborting sibling steps; the report is written next to the artifacts at the end of the run.
 */
export class DiagnosticsReport {
  private readonly artifacts: ArtifactRecord[] = []
  private readonly failureList: StepFailure[] = []
  private readonly noteList: string[] = []

  recordArtifact(record: ArtifactRecord): void {
    this.artifacts.push(record)
  }

  recordFailure(failure: StepFailure): void {
    this.failureList.push(failure)
  }

  addNote(message: string): void {
    this.noteList.push(message)
  }

  get failures(): readonly StepFailure[] {
    return this.failureList
  }

  get notes(): readonly string[] {
    return this.noteList
  }

  get artifactCount(): number {
    return this.artifacts.length
  }

  /** Artifacts whose command failed; their files hold the `ERROR: ` text. */
  get failedCommandCount(): number {
    return this.artifacts.filter((artifact) => !artifact.ok).length
  }

  toSummaryText(header: SummaryHeader): string {
    const lines = [`Debug Summary - ${header.generatedAt.toISOString()}`]
    lines.push(`Variant: ${header.variantLabel}`)
    if (header.namespace) {
      lines.push(`Namespace: ${header.namespace}`)
    }
    lines.push(`Artifacts: ${this.artifactCount} (${this.failedCommandCount} from failed commands)`)
    lines.push(`Step failures: ${this.failureList.length}`)
    for (const failure of this.failureList) {
      const target = failure.target ? ` ${failure.target}` : ""
      lines.push(`  - [${failure.step}]${target}: ${failure.message}`)
    }
    if (this.noteList.length > 0) {
      lines.push("Notes:")
      for (const note of this.noteList) {
        lines.push(`  - ${note}`)
      }
    }
    return `${lines.join("\n")}\n`
  }

  toJSON(): DiagnosticsReportJson {
    return {
      artifacts: [...this.artifacts],
      failures: [...this.failureList],
      notes: [...this.noteList],
    }
  }
}
