/*
Static description of a notebook, computed once before profiling it.
*/

import {
  cellTags,
  sourceText,
  type NotebookDocument,
} from "@nbperf/util/notebook-format";
import { parseAssignments } from "@nbperf/util/parse-assignments";
import type { PyValue } from "@nbperf/util/python-format";

import { PARAMETERS_TAG } from "./generator";

export const SKIP_PROFILING_TAG = "skip_profiling";
export const WAIT_FOR_VIZ_TAG = "wait_for_viz";

export interface CellSpec {
  // 1-based
  readonly index: number;
  // run the cell but collect no resource samples for it
  readonly skip_profiling: boolean;
  // the cell is done only once the visualization stops changing
  readonly wait_for_viz: boolean;
}

export interface NotebookInspection {
  total_cells: number;
  cell_specs: CellSpec[];
  parameters: Record<string, PyValue>;
}

export function inspectNotebook(notebook: NotebookDocument): NotebookInspection {
  const cell_specs = notebook.cells.map((cell, i) => {
    const tags = cellTags(cell);
    return Object.freeze({
      index: i + 1,
      skip_profiling: tags.includes(SKIP_PROFILING_TAG),
      wait_for_viz: tags.includes(WAIT_FOR_VIZ_TAG),
    });
  });
  const params = notebook.cells.find((cell) => cellTags(cell).includes(PARAMETERS_TAG));
  return {
    total_cells: notebook.cells.length,
    cell_specs,
    parameters: params == null ? {} : parseAssignments(sourceText(params)),
  };
}
