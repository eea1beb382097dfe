import type { PipelineState } from "./schema";

export class InvalidTransitionError extends Error {
  name = "InvalidTransitionError";

  constructor(readonly from: PipelineState, readonly to: PipelineState) {
    super(`Invalid pipeline transition ${from} -> ${to}`);
  }
}

export function nextPipelineState(state: PipelineState): PipelineState {
  switch (state) {
    case "START":
      return "CLASSIFIED";
    case "CLASSIFIED":
      return "DISPATCHED";
    case "DISPATCHED":
      return "FORMATTED";
    case "FORMATTED":
    case "DONE":
      return "DONE";
  }
}

/** Records the visited states of one request; only forward single steps are accepted. */
export class PipelineTrace {
  private readonly visited: PipelineState[] = ["START"];

  get current(): PipelineState {
    return this.visited[this.visited.length - 1];
  }

  advance(to: PipelineState): void {
    const from = this.current;
    if (from === "DONE" || nextPipelineState(from) !== to) {
      throw new InvalidTransitionError(from, to);
    }
    this.visited.push(to);
  }

  get states(): PipelineState[] {
    return [...this.visited];
  }
}
