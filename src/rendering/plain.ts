import type { CliRenderer, FileEntry, RunHeader, RunOutcome, ServiceStatus } from "./types.js"

export class PlainRenderer implements CliRenderer {
  header(run: RunHeader): void {
    console.log("=== OpenStack Debug Collector ===")
    console.log(`Variant: ${run.variantLabel}`)
    if (run.namespace) {
      console.log(`Namespace: ${run.namespace}`)
    }
    console.log(`Output:  ${run.outputDir}`)
    console.log(`Targets: ${run.targets.length > 0 ? run.targets.join(", ") : "none"}`)
    console.log("")
  }

  envTable(services: ServiceStatus[]): void {
    console.log("Requirement          Status")
    for (const service of services) {
      let status: string
      if (service.ready) {
        status = "ready"
      } else if (service.required) {
        status = "missing (required)"
      } else {
        status = "not set"
      }
      console.log(`${service.name.padEnd(20)} ${status}`)
    }
    console.log("")
  }

  info(message: string): void {
    console.log(`[INFO] ${message}`)
  }

  commandStarted(command: string): void {
    console.log(`[RUNNING] ${command}`)
  }

  debug(message: string): void {
    console.log(`[DEBUG] ${message}`)
  }

  runComplete(outcome: RunOutcome): void {
    console.log("")
    console.log("=== Collection Complete ===")
    console.log(`Duration:  ${outcome.elapsedSeconds}s`)
    console.log(`Output:    ${outcome.outputDir}`)
    console.log(`Artifacts: ${outcome.artifactCount}`)
    if (outcome.archivePath) {
      console.log(`Archive:   ${outcome.archivePath}`)
    }
    if (outcome.failures.length > 0) {
      console.log("")
      console.log(`Step failures (${outcome.failures.length}):`)
      for (const failure of outcome.failures) {
        const target = failure.target ? ` ${failure.target}` : ""
        console.log(`  [${failure.step}]${target}: ${failure.message}`)
      }
    }
    for (const note of outcome.notes) {
      console.log(`[NOTE] ${note}`)
    }
  }

  runFailed(message: string, hint: string | null): void {
    console.error(`[ERROR] ${message}`)
    if (hint) {
      console.error(`[HINT] ${hint}`)
    }
  }

  showFiles(files: FileEntry[]): void {
    console.log("")
    console.log("Files:")
    for (const file of files) {
      console.log(`  ${file.name.padEnd(48)} ${file.sizeKb}`)
    }
  }

  warn(message: string): void {
    console.warn(`[WARN] ${message}`)
  }

  error(message: string): void {
    console.error(`[ERROR] ${message}`)
  }
}
