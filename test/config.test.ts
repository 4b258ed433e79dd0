import { delimiter } from "node:path"

import { describe, expect, it } from "vitest"

import { DEFAULT_KUBECONFIG, readEnvConfig } from "../src/config.js"

describe("readEnvConfig", () => {
  it("treats blank variables as unset and falls back to the default kubeconfig", () => {
    expect(readEnvConfig({ OS_AUTH_URL: "  ", OS_USERNAME: "admin" })).toEqual({
      osAuthUrl: null,
      osUsername: "admin",
      osProjectName: null,
      kubeconfigPath: DEFAULT_KUBECONFIG,
      openstackBin: null,
      kubectlBin: null,
    })
  })

  it("uses the first file of a KUBECONFIG list and the binary overrides", () => {
    const config = readEnvConfig({
      KUBECONFIG: ["/etc/kube/a.yaml", "/etc/kube/b.yaml"].join(delimiter),
      OPENSTACK_BIN: "/opt/osc/bin/openstack",
      KUBECTL_BIN: "kubectl-1.30",
    })

    expect(config.kubeconfigPath).toBe("/etc/kube/a.yaml")
    expect(config.openstackBin).toBe("/opt/osc/bin/openstack")
    expect(config.kubectlBin).toBe("kubectl-1.30")
  })
})
