import type { StepFailure } from "../diagnostics/report.js"

export interface ServiceStatus {
  name: string
  ready: boolean
  required?: boolean
}

export interface FileEntry {
  name: string
  sizeKb: string
  isReport: boolean
}

export interface RunHeader {
  outputDir: string
  variantLabel: string
  namespace: string | null
  /** Resources requested on the command line, e.g. "vm 1234". */
  targets: string[]
}

export interface RunOutcome {
  elapsedSeconds: number
  outputDir: string
  archivePath: string | null
  artifactCount: number
  failures: readonly StepFailure[]
  notes: readonly string[]
}

export interface CliRenderer {
  // --- Setup ---
  header(run: RunHeader): void
  envTable(services: ServiceStatus[]): void

  // --- Collection ---
  /** Progress line for the step currently running. */
  info(message: string): void
  commandStarted(command: string): void
  debug(message: string): void

  // --- Completion ---
  runComplete(outcome: RunOutcome): void
  /** Fatal stop before collection finished. */
  runFailed(message: string, hint: string | null): void
  showFiles(files: FileEntry[]): void

  // --- General ---
  warn(message: string): void
  error(message: string): void
}
