import { homedir } from "node:os"
import { delimiter, join } from "node:path"

import { config as loadDotEnv } from "dotenv"

loadDotEnv()

export interface EnvConfig {
  osAuthUrl: string | null
  osUsername: string | null
  osProjectName: string | null
  kubeconfigPath: string
  openstackBin: string | null
  kubectlBin: string | null
}

const readVar = (env: NodeJS.ProcessEnv, name: string): string | null => {
  const value = env[name]?.trim()
  return value ? value : null
}

export const DEFAULT_KUBECONFIG = join(homedir(), ".kube", "config")

// KUBECONFIG may list several files; kubectl merges them, the first one must exist.
const firstPath = (value: string | null): string | null => value?.split(delimiter)[0] || null

export const readEnvConfig = (env: NodeJS.ProcessEnv = process.env): EnvConfig => ({
  osAuthUrl: readVar(env, "OS_AUTH_URL"),
  osUsername: readVar(env, "OS_USERNAME"),
  osProjectName: readVar(env, "OS_PROJECT_NAME"),
  kubeconfigPath: firstPath(readVar(env, "KUBECONFIG")) ?? DEFAULT_KUBECONFIG,
  openstackBin: readVar(env, "OPENSTACK_BIN"),
  kubectlBin: readVar(env, "KUBECTL_BIN"),
})
