export { type GridConfig, type GridEnv, readGridConfig } from "./config";
export {
  type GridBody,
  GridDriver,
  type GridDriverOptions,
  type GridState,
} from "./driver";
export { type GroupCoordinates, GroupContext } from "./group-context";
export { group, kernel, type KernelLauncher, type LaunchConfig } from "./kernel";
export { allocate, compact, load, MaskedBuffer, store } from "./masked-view";
export {
  groupCount,
  groupExtent,
  groupIndices,
  groupOrigin,
  MAX_GRID_RANK,
  validateLaunchShapes,
} from "./shape-arithmetic";
export { type GridTraceEvent, TraceRecorder } from "./trace";
