#!/usr/bin/env node
import { existsSync } from "node:fs"
import { mkdir } from "node:fs/promises"

import { FileArtifactStore } from "./artifacts/file-artifact-store.js"
import type { StoredFile } from "./artifacts/artifact-store.js"
import { ExecaCommandRunner } from "./command/execa-command-runner.js"
import { getVariant } from "./collectors/registry.js"
import { missingOpenstackEnv, PrerequisiteError } from "./collectors/prerequisites.js"
import type { CollectorVariant } from "./collectors/types.js"
import { readEnvConfig, type EnvConfig } from "./config.js"
import { createProgram, defaultOutputDir, parseOptions, type CliOptions } from "./options.js"
import { runCollection } from "./pipeline/run-collection.js"
import { createRenderer, toCollectorLog } from "./rendering/index.js"
import type { FileEntry, ServiceStatus } from "./rendering/types.js"
import { getErrorMessage } from "./utils/errors.js"

const REPORT_FILES = new Set(["summary.txt", "diagnostics.json"])

const buildServiceStatusEntries = (env: EnvConfig, variant: CollectorVariant): ServiceStatus[] => {
  const missing = new Set(missingOpenstackEnv(env))
  const entries: ServiceStatus[] = [
    { name: "OS_AUTH_URL", ready: !missing.has("OS_AUTH_URL"), required: !variant.kubernetes },
    { name: "OS_USERNAME", ready: !missing.has("OS_USERNAME"), required: !variant.kubernetes },
    {
      name: "OS_PROJECT_NAME",
      ready: !missing.has("OS_PROJECT_NAME"),
      required: !variant.kubernetes,
    },
  ]
  if (variant.kubernetes) {
    entries.push({
      name: `kubeconfig ${env.kubeconfigPath}`,
      ready: existsSync(env.kubeconfigPath),
      required: true,
    })
  }
  return entries
}

const requestedTargets = (options: CliOptions): string[] => {
  const targets: string[] = []
  for (const key of ["vm", "network", "port", "volume", "stack", "user"] as const) {
    const value = options[key]
    if (value) {
      targets.push(`${key} ${value}`)
    }
  }
  return targets
}

const toFileEntries = (files: StoredFile[]): FileEntry[] =>
  files.map((file) => ({
    name: file.path,
    sizeKb: `${(file.size / 1024).toFixed(1)} KB`,
    isReport: REPORT_FILES.has(file.path),
  }))

// ── Main ────────────────────────────────────────────────────────────

const main = async (): Promise<number> => {
  const startedAt = new Date()
  const program = createProgram()
  const rawArgs = process.argv.slice(2)
  const normalizedArgs = rawArgs[0] === "--" ? rawArgs.slice(1) : rawArgs
  program.parse(["node", "openstack-debug-collector", ...normalizedArgs])

  let options: CliOptions
  try {
    options = parseOptions(program)
  } catch (error) {
    console.error(getErrorMessage(error))
    return 1
  }

  const renderer = createRenderer(options.plain || !process.stdout.isTTY ? "plain" : "interactive")
  const variant = getVariant(options.variant)
  const env = readEnvConfig()
  const outputDir = options.output ?? defaultOutputDir(variant.outputPrefix, startedAt)
  await mkdir(outputDir, { recursive: true })

  renderer.header({
    outputDir,
    variantLabel: variant.label,
    namespace: options.namespace,
    targets: requestedTargets(options),
  })
  renderer.envTable(buildServiceStatusEntries(env, variant))

  const store = new FileArtifactStore({ rootDir: outputDir })
  const runner = new ExecaCommandRunner({
    binaries: { openstack: env.openstackBin, kubectl: env.kubectlBin },
    onCommand: options.verbose ? (command) => renderer.commandStarted(command) : undefined,
  })

  try {
    const { report, archivePath } = await runCollection(
      {
        variant,
        namespace: options.namespace,
        vm: options.vm,
        network: options.network,
        port: options.port,
        volume: options.volume,
        stack: options.stack,
        user: options.user,
        securityGroupSource: options.securityGroups,
        zip: options.zip,
      },
      { runner, store, env, log: toCollectorLog(renderer, options.verbose) },
    )

    renderer.runComplete({
      elapsedSeconds: Math.round((Date.now() - startedAt.getTime()) / 1000),
      outputDir,
      archivePath,
      artifactCount: report.artifactCount,
      failures: report.failures,
      notes: report.notes,
    })
    renderer.showFiles(toFileEntries(await store.list()))
    return 0
  } catch (error) {
    if (error instanceof PrerequisiteError) {
      renderer.runFailed(error.message, error.hint)
      return 1
    }
    throw error
  }
}

main()
  .then((code) => {
    process.exit(code)
  })
  .catch((error: unknown) => {
    console.error(`Unexpected error: ${getErrorMessage(error)}`)
    process.exit(1)
  })
