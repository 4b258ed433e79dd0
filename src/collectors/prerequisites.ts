import { access } from "node:fs/promises"

import type { CommandRunner } from "../command/command-runner.js"
import type { EnvConfig } from "../config.js"
import type { CollectorLog, CollectorVariant } from "./types.js"

/** A failed precondition. Nothing is collected once one is raised. */
export class PrerequisiteError extends Error {
  constructor(
    message: string,
    readonly hint: string | null = null,
  ) {
    super(message)
    this.name = "PrerequisiteError"
  }
}

export interface PrerequisiteDeps {
  runner: CommandRunner
  env: EnvConfig
  log: CollectorLog
  pathExists?: (path: string) => Promise<boolean>
}

const defaultPathExists = async (path: string): Promise<boolean> => {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

const RC_HINT = "Please source your OpenStack RC file (e.g. `source ~/admin-openrc.sh`)."

export const checkKubernetesAccess = async (
  deps: PrerequisiteDeps,
  namespace: string,
): Promise<void> => {
  deps.log.info("Checking prerequisites...")
  const pathExists = deps.pathExists ?? defaultPathExists
  if (!(await pathExists(deps.env.kubeconfigPath))) {
    throw new PrerequisiteError(`Kubeconfig not found at ${deps.env.kubeconfigPath}.`)
  }

  const context = await deps.runner.run(["kubectl", "config", "current-context"])
  if (!context.ok) {
    throw new PrerequisiteError(`Unable to access Kubernetes context: ${context.reason}`)
  }

  const ns = await deps.runner.run(["kubectl", "get", "ns", namespace])
  if (!ns.ok || ns.output.includes("NotFound")) {
    const detail = ns.ok ? ns.output : ns.reason
    throw new PrerequisiteError(`Namespace '${namespace}' is not accessible: ${detail}`)
  }
  deps.log.info("Prerequisites met.")
}

export const REQUIRED_OPENSTACK_ENV = ["OS_AUTH_URL", "OS_USERNAME", "OS_PROJECT_NAME"] as const

export const missingOpenstackEnv = (env: EnvConfig): string[] => {
  const values: Record<(typeof REQUIRED_OPENSTACK_ENV)[number], string | null> = {
    OS_AUTH_URL: env.osAuthUrl,
    OS_USERNAME: env.osUsername,
    OS_PROJECT_NAME: env.osProjectName,
  }
  return REQUIRED_OPENSTACK_ENV.filter((name) => !values[name])
}

export const checkOpenstackAuth = async (
  deps: PrerequisiteDeps,
  requireEnv: boolean,
): Promise<void> => {
  deps.log.info("Checking OpenStack authentication...")
  if (requireEnv) {
    const missing = missingOpenstackEnv(deps.env)
    if (missing.length > 0) {
      throw new PrerequisiteError(`Missing environment variables: ${missing.join(", ")}`, RC_HINT)
    }
  }

  const token = await deps.runner.run(["openstack", "token", "issue"])
  if (!token.ok) {
    throw new PrerequisiteError(
      `OpenStack CLI is not authenticated: ${token.reason}`,
      "Please ensure your RC file is sourced and credentials are correct.",
    )
  }
  deps.log.info("OpenStack authentication validated.")
}

export const checkPrerequisites = async (
  deps: PrerequisiteDeps,
  variant: CollectorVariant,
  namespace: string | null,
): Promise<void> => {
  if (variant.kubernetes) {
    if (!namespace) {
      throw new PrerequisiteError(`The ${variant.id} variant requires --namespace.`)
    }
    await checkKubernetesAccess(deps, namespace)
  }
  await checkOpenstackAuth(deps, !variant.kubernetes)
}
