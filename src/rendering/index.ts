import type { CollectorLog } from "../collectors/types.js"
import { InteractiveRenderer } from "./interactive.js"
import { PlainRenderer } from "./plain.js"
import type { CliRenderer } from "./types.js"

export * from "./types.js"

export const createRenderer = (mode: "interactive" | "plain"): CliRenderer => {
  if (mode === "plain") {
    return new PlainRenderer()
  }
  return new InteractiveRenderer()
}

export const toCollectorLog = (renderer: CliRenderer, verbose: boolean): CollectorLog => ({
  info: (message) => renderer.info(message),
  warn: (message) => renderer.warn(message),
  error: (message) => renderer.error(message),
  debug: (message) => {
    if (verbose) {
      renderer.debug(message)
    }
  },
})
