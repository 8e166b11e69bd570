/**
 * Driver settings, defaulting from the environment.
 *
 * TILESIM_TRACE=1  record GridTraceEvents on the driver's TraceRecorder
 * TILESIM_LOG=1    print one `[grid]` line per launch, tile and completion
 */

export type GridEnv = Record<string, string | undefined>;

export interface GridConfig {
  trace: boolean;
  log: boolean;
}

function processEnv(): GridEnv {
  return typeof process !== "undefined" && process.env ? process.env : {};
}

export function readGridConfig(env: GridEnv = processEnv()): GridConfig {
  return {
    trace: env.TILESIM_TRACE === "1",
    log: env.TILESIM_LOG === "1",
  };
}
