import type { CollectorVariant, HealthCheck, VariantId } from "./types.js"

const BASE_HEALTH_CHECKS: readonly HealthCheck[] = [
  { name: "compute_services", args: ["openstack", "compute", "service", "list"] },
  { name: "resource_providers", args: ["openstack", "resource", "provider", "list"] },
  { name: "network_agents", args: ["openstack", "network", "agent", "list"] },
]

const VOLUME_SERVICES: HealthCheck = {
  name: "volume_services",
  args: ["openstack", "volume", "service", "list"],
}

const HYPERVISORS: HealthCheck = {
  name: "hypervisors",
  args: ["openstack", "hypervisor", "list", "--long"],
}

const VARIANTS: ReadonlyMap<VariantId, CollectorVariant> = new Map<VariantId, CollectorVariant>([
  [
    "kubernetes",
    {
      id: "kubernetes",
      label: "OpenStack on Kubernetes",
      outputPrefix: "debug-output",
      kubernetes: true,
      healthChecks: [...BASE_HEALTH_CHECKS, VOLUME_SERVICES],
      serverShowArgs: [],
      savePortDetailJson: false,
      securityGroupSource: "port-list",
    },
  ],
  [
    "standalone",
    {
      id: "standalone",
      label: "OpenStack CLI",
      outputPrefix: "openstack-debug",
      kubernetes: false,
      healthChecks: [...BASE_HEALTH_CHECKS, HYPERVISORS, VOLUME_SERVICES],
      serverShowArgs: ["--fit-width", "--max-width", "500"],
      savePortDetailJson: true,
      securityGroupSource: "port-detail",
    },
  ],
])

export const ALL_VARIANT_IDS: readonly VariantId[] = [...VARIANTS.keys()]

const VARIANT_ID_SET: ReadonlySet<string> = new Set<string>(VARIANTS.keys())

export const isVariantId = (value: string): value is VariantId => VARIANT_ID_SET.has(value)

export const getVariant = (id: VariantId): CollectorVariant => {
  const variant = VARIANTS.get(id)
  if (!variant) {
    throw new Error(`Unknown variant: "${id}". Available: ${ALL_VARIANT_IDS.join(", ")}`)
  }
  return variant
}
