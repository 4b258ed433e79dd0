import boxen from "boxen"
import chalk from "chalk"
import Table from "cli-table3"
import ora, { type Ora } from "ora"

import type { CliRenderer, FileEntry, RunHeader, RunOutcome, ServiceStatus } from "./types.js"

export class InteractiveRenderer implements CliRenderer {
  private activity: Ora | null = null

  header(run: RunHeader): void {
    const lines = [`${chalk.bold("Variant")}   ${run.variantLabel}`]
    if (run.namespace) {
      lines.push(`${chalk.bold("Namespace")} ${run.namespace}`)
    }
    lines.push(`${chalk.bold("Output")}    ${run.outputDir}`)
    const targets = run.targets.length > 0 ? run.targets.join(", ") : chalk.gray("none")
    lines.push(`${chalk.bold("Targets")}   ${targets}`)

    console.log(
      boxen(lines.join("\n"), {
        title: chalk.bold("OpenStack Debug Collector"),
        borderColor: "blue",
        padding: 1,
      }),
    )
  }

  envTable(services: ServiceStatus[]): void {
    const table = new Table({
      head: [chalk.bold("Requirement"), chalk.bold("Status")],
    })

    for (const service of services) {
      let status: string
      if (service.ready) {
        status = chalk.green("ready")
      } else if (service.required) {
        status = chalk.red("missing (required)")
      } else {
        status = chalk.gray("not set")
      }
      table.push([service.name, status])
    }

    console.log(table.toString())
  }

  info(message: string): void {
    if (!this.activity) {
      this.activity = ora(message).start()
      return
    }
    this.activity.text = message
  }

  commandStarted(command: string): void {
    this.printAbove(() => console.log(chalk.gray(`$ ${command}`)))
  }

  debug(message: string): void {
    this.printAbove(() => console.log(chalk.gray(message)))
  }

  runComplete(outcome: RunOutcome): void {
    if (outcome.failures.length > 0) {
      this.activity?.warn(`Collection finished with ${outcome.failures.length} step failure(s)`)
    } else {
      this.activity?.succeed("Collection finished")
    }
    this.activity = null

    const lines = [
      `${chalk.bold("Duration")}    ${outcome.elapsedSeconds}s`,
      `${chalk.bold("Output")}      ${outcome.outputDir}`,
      `${chalk.bold("Artifacts")}   ${outcome.artifactCount}`,
    ]
    if (outcome.archivePath) {
      lines.push(`${chalk.bold("Archive")}     ${outcome.archivePath}`)
    }
    console.log(
      boxen(lines.join("\n"), {
        title: chalk.green("Collection Complete"),
        borderColor: outcome.failures.length > 0 ? "yellow" : "green",
        padding: 1,
      }),
    )

    if (outcome.failures.length > 0) {
      const table = new Table({
        head: [chalk.bold("Step"), chalk.bold("Target"), chalk.bold("Failure")],
        colWidths: [18, 40, 70],
        wordWrap: true,
      })
      for (const failure of outcome.failures) {
        table.push([failure.step, failure.target ?? "-", chalk.yellow(failure.message)])
      }
      console.log(table.toString())
    }

    for (const note of outcome.notes) {
      console.log(chalk.cyan(`note: ${note}`))
    }
  }

  runFailed(message: string, hint: string | null): void {
    if (this.activity) {
      this.activity.fail(message)
      this.activity = null
    } else {
      console.error(chalk.red(message))
    }
    if (hint) {
      console.error(chalk.gray(hint))
    }
  }

  showFiles(files: FileEntry[]): void {
    const table = new Table({
      head: [chalk.bold("File"), chalk.bold("Size")],
    })

    for (const file of files) {
      table.push([file.isReport ? chalk.green(file.name) : file.name, file.sizeKb])
    }

    console.log(table.toString())
  }

  warn(message: string): void {
    this.printAbove(() => console.warn(chalk.yellow(message)))
  }

  error(message: string): void {
    this.printAbove(() => console.error(chalk.red(message)))
  }

  // Keeps the spinner line below anything printed while it spins.
  private printAbove(print: () => void): void {
    const spinner = this.activity
    if (!spinner?.isSpinning) {
      print()
      return
    }
    spinner.clear()
    print()
    spinner.render()
  }
}
