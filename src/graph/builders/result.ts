import { GraphBuildError } from "../graph-errors";

export type BuildResult<T> = { ok: true; value: T } | { ok: false; error: GraphBuildError };

/**
 * Runs a builder and reports a failed precondition as a value. A failed
 * builder has not touched the graph. Any other error propagates.
 */
export function tryBuild<T>(build: () => T): BuildResult<T> {
  try {
    return { ok: true, value: build() };
  } catch (error) {
    if (error instanceof GraphBuildError) {
      return { ok: false, error };
    }
    throw error;
  }
}
