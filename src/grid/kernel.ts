import { type Shape, toShape } from "../core/shape";
import { type GridBody, GridDriver, type GridDriverOptions } from "./driver";
import { validateLaunchShapes } from "./shape-arithmetic";

export type LaunchConfig = {
  readonly globalSize: Shape;
  readonly localSize: Shape;
};

/** Validated launch shape: `global` split into tiles of `local`. */
export function group(globalSize: number | Shape, localSize: number | Shape): LaunchConfig {
  const global = toShape(globalSize);
  const local = toShape(localSize);
  validateLaunchShapes(global, local);
  return Object.freeze({
    globalSize: Object.freeze(global),
    localSize: Object.freeze(local),
  });
}

export type KernelLauncher<A extends unknown[]> = (launch: LaunchConfig, ...args: A) => void;

/**
 * Wrap a tile body as a launchable kernel. Each launch runs on its own
 * driver, so concurrent launches of the same kernel share nothing.
 */
export function kernel<A extends unknown[]>(
  body: GridBody<A>,
  options: GridDriverOptions = {},
): KernelLauncher<A> {
  return (launch, ...args) => {
    new GridDriver(options).run(launch.globalSize, launch.localSize, body, ...args);
  };
}
