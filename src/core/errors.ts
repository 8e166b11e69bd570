export class InvalidShapeError extends Error {
  name = "InvalidShapeError";
}

export class OutOfRangeAccessError extends Error {
  name = "OutOfRangeAccessError";
}

export class GridBusyError extends Error {
  name = "GridBusyError";
}

export class AsyncTileBodyError extends Error {
  name = "AsyncTileBodyError";
}
