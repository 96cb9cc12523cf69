import type { CellExecutionStatus } from "@nbperf/util/metrics";

// The page does not show the notebook that was uploaded.
export class CellCountMismatchError extends Error {
  expected: number;
  actual: number;
  constructor(expected: number, actual: number) {
    super(`the page shows ${actual} code cells but the notebook has ${expected}`);
    this.name = "CellCountMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class IllegalTransitionError extends Error {
  constructor(cellIndex: number, from: CellExecutionStatus, to: CellExecutionStatus) {
    super(`cell ${cellIndex}: illegal status transition '${from}' -> '${to}'`);
    this.name = "IllegalTransitionError";
  }
}

export class KernelUnavailableError extends Error {
  constructor(cellIndex: number) {
    super(`cannot execute cell ${cellIndex}: the kernel process id is unavailable`);
    this.name = "KernelUnavailableError";
  }
}
