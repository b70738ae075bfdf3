/**
 * Error taxonomy for graph loading and evaluation.
 *
 * Configuration and device errors abort evaluation and propagate to the caller.
 * Auxiliary data failures never surface here; the provider substitutes a
 * fallback buffer and logs a warning instead.
 */

export type GraphConfigErrorCode =
  | "cycle"
  | "capacity"
  | "filter-range"
  | "parent-range"
  | "subroutine-index"
  | "subroutine-recursion"
  | "descriptor"
  | "malformed";

/** A graph or registry entry that can never evaluate. Detected at load time. */
export class GraphConfigError extends Error {
  readonly code: GraphConfigErrorCode;

  constructor(code: GraphConfigErrorCode, message: string) {
    super(message);
    this.name = "GraphConfigError";
    this.code = code;
  }
}

/** The device could not provide a buffer, or the pool budget is exhausted. */
export class ResourceExhaustedError extends Error {
  readonly requestedBytes: number;

  constructor(message: string, requestedBytes: number) {
    super(message);
    this.name = "ResourceExhaustedError";
    this.requestedBytes = requestedBytes;
  }
}

/** The renderer is gone. Fatal for every session using it. */
export class DeviceLostError extends Error {
  constructor(message = "Render device lost") {
    super(message);
    this.name = "DeviceLostError";
  }
}

/** Evaluation stopped between two nodes because the caller aborted it. */
export class EvaluationAbortedError extends Error {
  readonly nodeIndex: number;

  constructor(nodeIndex: number) {
    super(`Evaluation aborted before node ${nodeIndex}`);
    this.name = "EvaluationAbortedError";
    this.nodeIndex = nodeIndex;
  }
}
