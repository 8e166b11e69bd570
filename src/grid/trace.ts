export type GridTraceEvent =
  | {
      type: "grid_start";
      globalSize: readonly number[];
      localSize: readonly number[];
      groupCount: readonly number[];
    }
  | {
      type: "tile";
      groupId: readonly number[];
      workOffset: readonly number[];
      groupShape: readonly number[];
    }
  | {
      type: "grid_finish";
      tiles: number;
    }
  | {
      type: "grid_abort";
      groupId: readonly number[];
      tiles: number;
      error: string;
    };

export class TraceRecorder {
  private readonly events: GridTraceEvent[] = [];

  record(event: GridTraceEvent): void {
    this.events.push(event);
  }

  snapshot(): GridTraceEvent[] {
    return this.events.slice();
  }

  clear(): void {
    this.events.length = 0;
  }
}
