import type { NotebookDocument } from "@nbperf/util/notebook-format";

import { inspectNotebook } from "./inspect";

const NOTEBOOK: NotebookDocument = {
  cells: [
    { cell_type: "code", source: "import x", metadata: { tags: ["skip_profiling"] } },
    {
      cell_type: "code",
      source: ["n_value = 3\n", "ui_network_throttling = 500_000\n", "name = 'a'"],
      metadata: { tags: ["parameters"] },
    },
    { cell_type: "code", source: "show()", metadata: { tags: ["wait_for_viz", "skip_profiling"] } },
    { cell_type: "code", source: "print(1)" },
  ],
  metadata: {},
  nbformat: 4,
  nbformat_minor: 5,
};

describe("inspectNotebook", () => {
  it("derives each cell's profiling flags from its tags", () => {
    const { total_cells, cell_specs } = inspectNotebook(NOTEBOOK);
    expect(total_cells).toBe(4);
    expect(cell_specs).toEqual([
      { index: 1, skip_profiling: true, wait_for_viz: false },
      { index: 2, skip_profiling: false, wait_for_viz: false },
      { index: 3, skip_profiling: true, wait_for_viz: true },
      { index: 4, skip_profiling: false, wait_for_viz: false },
    ]);
    expect(Object.isFrozen(cell_specs[0])).toBe(true);
  });

  it("reads literal parameters from the parameters cell", () => {
    expect(inspectNotebook(NOTEBOOK).parameters).toEqual({
      n_value: 3,
      ui_network_throttling: 500000,
      name: "a",
    });
  });

  it("has no parameters without a parameters cell", () => {
    const nb: NotebookDocument = { ...NOTEBOOK, cells: [NOTEBOOK.cells[0]] };
    expect(inspectNotebook(nb)).toEqual({
      total_cells: 1,
      cell_specs: [{ index: 1, skip_profiling: true, wait_for_viz: false }],
      parameters: {},
    });
  });
});
