import { AsyncTileBodyError, GridBusyError } from "../core/errors";
import { formatShape, type Shape } from "../core/shape";
import { readGridConfig } from "./config";
import { GroupContext } from "./group-context";
import { groupCount, groupExtent, groupIndices, groupOrigin } from "./shape-arithmetic";
import { TraceRecorder } from "./trace";

export type GridState = "idle" | "running";

/** A tile body: called once per group with that group's context. */
export type GridBody<A extends unknown[] = []> = (ctx: GroupContext, ...args: A) => void;

export type GridDriverOptions = {
  /** Record events on `driver.trace`. Defaults to TILESIM_TRACE=1. */
  trace?: boolean;
  /** Log launches and tiles with console.log. Defaults to TILESIM_LOG=1. */
  log?: boolean;
};

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs a body over every tile of a launch, one tile at a time, in row-major
 * group order (last dimension fastest).
 */
export class GridDriver {
  readonly trace = new TraceRecorder();
  private readonly traceEnabled: boolean;
  private readonly logEnabled: boolean;
  private stateValue: GridState = "idle";

  constructor(options: GridDriverOptions = {}) {
    const defaults = readGridConfig();
    this.traceEnabled = options.trace ?? defaults.trace;
    this.logEnabled = options.log ?? defaults.log;
  }

  get state(): GridState {
    return this.stateValue;
  }

  run<A extends unknown[]>(
    globalSize: Shape,
    localSize: Shape,
    body: GridBody<A>,
    ...args: A
  ): void {
    if (this.stateValue === "running") {
      throw new GridBusyError("Grid driver is already running");
    }
    const counts = groupCount(globalSize, localSize);

    this.stateValue = "running";
    let tiles = 0;
    let current: readonly number[] = [];
    try {
      if (this.traceEnabled) {
        this.trace.record({
          type: "grid_start",
          globalSize: globalSize.slice(),
          localSize: localSize.slice(),
          groupCount: counts.slice(),
        });
      }
      if (this.logEnabled) {
        console.log(
          `[grid] launch global=${formatShape(globalSize)} local=${formatShape(localSize)} groups=${formatShape(counts)}`,
        );
      }

      for (const groupIndex of groupIndices(counts)) {
        current = groupIndex;
        const workOffset = groupOrigin(groupIndex, localSize);
        const groupShape = groupExtent(workOffset, localSize, globalSize);
        const ctx = new GroupContext({
          groupIndex,
          workOffset,
          groupShape,
          localSize,
          globalSize,
          groupCount: counts,
        });

        if (this.traceEnabled) {
          this.trace.record({
            type: "tile",
            groupId: ctx.groupId(),
            workOffset: ctx.workOffset(),
            groupShape: ctx.groupShape(),
          });
        }
        if (this.logEnabled) {
          console.log(
            `[grid] tile id=${formatShape(groupIndex)} offset=${formatShape(workOffset)} shape=${formatShape(groupShape)}`,
          );
        }

        const result: unknown = body(ctx, ...args);
        if (isThenable(result)) {
          const tile = formatShape(groupIndex);
          void Promise.resolve(result).then(undefined, (reason: unknown) => {
            console.warn(`[grid] async tile ${tile} rejected after the run was aborted:`, reason);
          });
          throw new AsyncTileBodyError(
            `Tile ${formatShape(groupIndex)} returned a promise; grid bodies must be synchronous`,
          );
        }
        tiles += 1;
      }

      if (this.traceEnabled) {
        this.trace.record({ type: "grid_finish", tiles });
      }
      if (this.logEnabled) {
        console.log(`[grid] finish tiles=${tiles}`);
      }
    } catch (error) {
      if (this.traceEnabled) {
        this.trace.record({
          type: "grid_abort",
          groupId: current,
          tiles,
          error: describeError(error),
        });
      }
      if (this.logEnabled) {
        console.log(`[grid] abort at ${formatShape(current)} after ${tiles} tiles: ${describeError(error)}`);
      }
      throw error;
    } finally {
      this.stateValue = "idle";
    }
  }
}
