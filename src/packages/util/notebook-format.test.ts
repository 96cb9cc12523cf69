import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  cellTags,
  parseNotebook,
  readNotebook,
  serializeNotebook,
  sourceLines,
  sourceText,
  writeNotebook,
  type NotebookDocument,
} from "./notebook-format";

const NOTEBOOK = {
  cells: [
    {
      cell_type: "code",
      execution_count: null,
      id: "a1",
      metadata: { tags: ["parameters"], collapsed: false },
      outputs: [],
      source: ["x = 1\n", "y = 2"],
    },
    { cell_type: "markdown", metadata: {}, source: "# Title" },
  ],
  metadata: { kernelspec: { name: "python3" } },
  nbformat: 4,
  nbformat_minor: 5,
};

describe("parseNotebook", () => {
  it("keeps cells with their extra fields", () => {
    const nb = parseNotebook(JSON.stringify(NOTEBOOK));
    expect(nb.cells).toHaveLength(2);
    expect(nb.cells[0].id).toBe("a1");
    expect(nb.cells[0].metadata).toEqual({ collapsed: false, tags: ["parameters"] });
    expect(nb.metadata).toEqual({ kernelspec: { name: "python3" } });
  });

  it("rejects documents without cells", () => {
    expect(() => parseNotebook("{}")).toThrow("not a notebook: missing cells");
  });

  it("rejects malformed cells", () => {
    const bad = { ...NOTEBOOK, cells: [{ cell_type: "code", source: 3 }] };
    expect(() => parseNotebook(JSON.stringify(bad))).toThrow("cell 0 has an invalid source");
    const badTags = {
      ...NOTEBOOK,
      cells: [{ cell_type: "code", source: "", metadata: { tags: "x" } }],
    };
    expect(() => parseNotebook(JSON.stringify(badTags))).toThrow("cell 0 has invalid tags");
  });
});

describe("cell helpers", () => {
  it("joins list sources", () => {
    const nb = parseNotebook(JSON.stringify(NOTEBOOK));
    expect(sourceText(nb.cells[0])).toBe("x = 1\ny = 2");
    expect(sourceText(nb.cells[1])).toBe("# Title");
  });

  it("splits text into lines keeping newlines", () => {
    expect(sourceLines("a\nb\n")).toEqual(["a\n", "b\n"]);
    expect(sourceLines("a\n\nb")).toEqual(["a\n", "\n", "b"]);
    expect(sourceLines("")).toEqual([]);
  });

  it("reads tags", () => {
    const nb = parseNotebook(JSON.stringify(NOTEBOOK));
    expect(cellTags(nb.cells[0])).toEqual(["parameters"]);
    expect(cellTags(nb.cells[1])).toEqual([]);
  });
});

describe("serializeNotebook", () => {
  it("writes sorted, one-space indented JSON with line-list sources", () => {
    const nb: NotebookDocument = {
      cells: [{ cell_type: "code", source: "a = 1\nb = 2", metadata: {} }],
      metadata: {},
      nbformat: 4,
      nbformat_minor: 5,
    };
    expect(serializeNotebook(nb)).toBe(
      [
        "{",
        ' "cells": [',
        "  {",
        '   "cell_type": "code",',
        '   "metadata": {},',
        '   "source": [',
        '    "a = 1\\n",',
        '    "b = 2"',
        "   ]",
        "  }",
        " ],",
        ' "metadata": {},',
        ' "nbformat": 4,',
        ' "nbformat_minor": 5',
        "}",
        "",
      ].join("\n"),
    );
  });
});

describe("reading and writing files", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "nbperf-format-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("round trips through disk", async () => {
    const path = join(dir, "a.ipynb");
    await writeNotebook(path, parseNotebook(JSON.stringify(NOTEBOOK)));
    const text = await readFile(path, "utf8");
    expect(text.endsWith("}\n")).toBe(true);
    const nb = await readNotebook(path);
    expect(sourceText(nb.cells[0])).toBe("x = 1\ny = 2");
  });

  it("names the file in parse errors", async () => {
    const path = join(dir, "bad.ipynb");
    await writeFile(path, "{}", "utf8");
    await expect(readNotebook(path)).rejects.toThrow(
      `${path}: not a notebook: missing cells`,
    );
  });
});
