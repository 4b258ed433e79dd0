import { describe, expect, it } from "vitest"

import { collectImageAndFlavor, collectServer } from "../../src/collectors/nova.js"
import { makeContext, ScriptedRunner } from "../support/stubs.js"

const IMAGE_ID = "11111111-1111-1111-1111-111111111111"
const FLAVOR_ID = "22222222-2222-2222-2222-222222222222"

describe("nova collector", () => {
  it("fetches image and flavor details keyed on the extracted ids", async () => {
    const runner = new ScriptedRunner({
      "openstack server show vm-1 -f json": JSON.stringify({
        image: `cirros (${IMAGE_ID})`,
        flavor: { id: FLAVOR_ID },
      }),
      [`openstack image show ${IMAGE_ID}`]: "| name | cirros |",
      [`openstack flavor show ${FLAVOR_ID}`]: "| name | m1.tiny |",
    })
    const ctx = makeContext(runner)

    const server = await collectServer(ctx, "vm-1")
    expect(server).not.toBeNull()
    if (server) {
      await collectImageAndFlavor(ctx, "vm-1", server)
    }

    expect(ctx.store.files.get("glance/image_show.txt")).toBe("| name | cirros |")
    expect(ctx.store.files.get("nova/flavor_show.txt")).toBe("| name | m1.tiny |")
    expect(ctx.report.failures).toEqual([])
  })

  it("stores server detail, events and migrations", async () => {
    const runner = new ScriptedRunner({
      "openstack server show vm-1 --fit-width --max-width 500": "| status | ACTIVE |",
      "openstack server event list vm-1": "| create |",
      "openstack server migration list --server vm-1": { fail: "No migrations API" },
      "openstack server show vm-1 -f json": "{}",
    })
    const ctx = makeContext(runner)

    await collectServer(ctx, "vm-1")

    expect(ctx.store.files.get("nova/server_show.txt")).toBe("| status | ACTIVE |")
    expect(ctx.store.files.get("nova/server_events.txt")).toBe("| create |")
    expect(ctx.store.files.get("nova/migrations.txt")).toBe("ERROR: No migrations API")
    expect(ctx.report.failedCommandCount).toBe(1)
  })

  it("uses the plain server show for the kubernetes variant", async () => {
    const runner = new ScriptedRunner({ "openstack server show vm-1 -f json": "{}" })
    const ctx = makeContext(runner, "kubernetes")

    await collectServer(ctx, "vm-1")

    expect(runner.calls[0]).toBe("openstack server show vm-1")
  })

  it("records a failure and returns null when the JSON detail is unusable", async () => {
    const runner = new ScriptedRunner({
      "openstack server show vm-1 -f json": { fail: "No server with a name or ID of 'vm-1' exists." },
    })
    const ctx = makeContext(runner)

    expect(await collectServer(ctx, "vm-1")).toBeNull()
    expect(ctx.report.failures).toEqual([
      {
        step: "nova",
        target: "vm-1",
        message:
          "Failed to parse VM details: `openstack server show vm-1 -f json` failed: No server with a name or ID of 'vm-1' exists.",
      },
    ])
  })

  it("skips lookups for missing or empty image and flavor", async () => {
    const runner = new ScriptedRunner()
    const ctx = makeContext(runner)

    await collectImageAndFlavor(ctx, "vm-1", { image: "", flavor: { original_name: "m1.tiny" } })

    expect(runner.calls).toEqual([])
    expect(ctx.store.files.size).toBe(0)
  })
})
