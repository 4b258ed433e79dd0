import { toFileComponent } from "../artifacts/artifact-store.js"
import { parseCommandJson } from "../command/json.js"
import { podListSchema, type Pod } from "../schema/kubernetes.js"
import { captureCommand, recordFailure, saveArtifact } from "./capture.js"
import type { CollectContext } from "./types.js"

export const collectNamespaceEvents = async (
  ctx: CollectContext,
  namespace: string,
): Promise<void> => {
  await captureCommand(
    ctx,
    "events",
    namespace,
    ["kubectl", "get", "events", "-n", namespace, "--sort-by=.lastTimestamp"],
    { category: "events", fileName: `${toFileComponent(namespace)}_events.txt` },
  )
}

export const matchPods = (pods: readonly Pod[], nameContains: string): Pod[] => {
  const needle = nameContains.toLowerCase()
  return pods.filter((pod) => pod.metadata.name.toLowerCase().includes(needle))
}

/**
 * Current and previous logs of every container, plus `kubectl describe`, for the pods of
 * `namespace` whose name contains `component`. A missing previous instance is not a failure.
 */
export const collectPodLogs = async (
  ctx: CollectContext,
  namespace: string,
  component: string,
): Promise<void> => {
  ctx.log.info(`Collecting logs for: ${component}`)
  const listing = parseCommandJson(
    await ctx.runner.run(["kubectl", "get", "pods", "-n", namespace, "-o", "json"]),
    podListSchema,
  )
  if (!listing.ok) {
    recordFailure(ctx, "pod-logs", component, `Failed to parse pod list: ${listing.message}`)
    return
  }

  const prefix = toFileComponent(component)
  for (const pod of matchPods(listing.data.items, component)) {
    const podName = pod.metadata.name
    const podFile = `${prefix}_${toFileComponent(podName)}`
    for (const container of pod.spec?.containers ?? []) {
      const logArgs = ["kubectl", "logs", podName, "-n", namespace, "-c", container.name]
      const containerFile = `${podFile}_${toFileComponent(container.name)}`

      await captureCommand(ctx, "pod-logs", podName, logArgs, {
        category: "logs",
        fileName: `${containerFile}.log`,
      })

      const previous = await ctx.runner.run([...logArgs, "--previous"])
      if (previous.ok) {
        await saveArtifact(
          ctx,
          "pod-logs",
          podName,
          { category: "logs", fileName: `${containerFile}_previous.log`, payload: previous.output },
          previous,
        )
      } else {
        ctx.log.debug(`No previous logs for ${podName}/${container.name}`)
      }
    }

    await captureCommand(
      ctx,
      "pod-logs",
      podName,
      ["kubectl", "describe", "pod", podName, "-n", namespace],
      { category: "describe", fileName: `${podFile}.txt` },
    )
  }
}
