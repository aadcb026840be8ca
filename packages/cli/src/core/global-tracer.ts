import path from "node:path";
import { errorMessage, getAgentpackHome } from "@agentpack/core";
import { Tracer } from "./tracer.js";

let _tracer: Tracer | null = null;
let _debug = process.env.AGENTPACK_DEBUG === "1";

export function tracesDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getAgentpackHome(env), "traces");
}

/** Turn on debug entries for the tracer created next */
export function setDebugMode(enabled: boolean): void {
  _debug = enabled;
}

export function getTracer(): Tracer {
  if (!_tracer) {
    const dir = tracesDir();
    _tracer = new Tracer(path.join(dir, "trace.db"), {
      snapshotDir: path.join(dir, "snapshots"),
      debugMode: _debug,
    });
  }
  return _tracer;
}

/** Trim and close the tracer. Storage failures become warnings. */
export function closeTracer(): void {
  if (!_tracer) return;
  const tracer = _tracer;
  _tracer = null;

  try {
    tracer.vacuum();
  } catch (error) {
    console.error(`Warning: trace log not trimmed: ${errorMessage(error)}`);
  }
  try {
    tracer.close();
  } catch (error) {
    console.error(`Warning: trace log not closed: ${errorMessage(error)}`);
  }
}

// Trim the ring buffer on process exit
process.on("exit", () => {
  closeTracer();
});
