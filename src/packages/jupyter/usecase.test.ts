import { mkdir, mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { readNotebook } from "@nbperf/util/notebook-format";

import { NotebookGenerator } from "./generator";
import { createUsecase, EXAMPLE_PARAMS } from "./usecase";

describe("createUsecase", () => {
  let root = "";

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "nbperf-usecase-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("scaffolds a template, example params and a notebooks directory", async () => {
    const dir = await createUsecase(root, "  demo ");
    expect(dir).toBe(join(root, "demo"));
    expect((await readdir(dir)).sort()).toEqual(["notebooks", "params.json", "template.ipynb"]);
    expect(await readdir(join(dir, "notebooks"))).toEqual([".keep"]);
    expect(JSON.parse(await readFile(join(dir, "params.json"), "utf8"))).toEqual(EXAMPLE_PARAMS);
  });

  it("writes a template the generator accepts", async () => {
    const dir = await createUsecase(root, "demo");
    const generator = await NotebookGenerator.fromFile(join(dir, "template.ipynb"));
    expect(generator.parameterNames()).toEqual(["paramA_value", "paramB_value", "paramC_value"]);
    const nb = generator.generate({ paramA_value: 1, paramB_value: "x", paramC_value: true });
    expect(nb.cells[1].source).toBe(
      [
        "paramA_value = 1",
        "paramB_value = 'x'",
        "paramC_value = True",
        "# download throughput in bytes per second while profiling",
        "ui_network_throttling = None",
        'print("DONE")',
      ].join("\n"),
    );
    const template = await readNotebook(join(dir, "template.ipynb"));
    expect(template.cells).toHaveLength(5);
  });

  it("refuses empty names and existing directories", async () => {
    await expect(createUsecase(root, "   ")).rejects.toThrow(
      "the use case name cannot be empty or whitespace",
    );
    await mkdir(join(root, "taken"));
    await expect(createUsecase(root, "taken")).rejects.toThrow(
      `the use case directory '${join(root, "taken")}' already exists`,
    );
  });
});
