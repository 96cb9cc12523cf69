/*
Reading and writing .ipynb files (nbformat 4).

Only the fields the profiler looks at are typed; everything else in a cell or
in the notebook metadata is carried through untouched.
*/

import { readFile, writeFile } from "node:fs/promises";

import { isRecord, isStringArray } from "./misc";

export type CellType = "code" | "markdown" | "raw";

export type CellMetadata = {
  tags?: string[];
  [key: string]: unknown;
};

export type NotebookCell = {
  cell_type: CellType;
  source: string | string[];
  metadata?: CellMetadata;
  execution_count?: number | null;
  outputs?: unknown[];
  [key: string]: unknown;
};

export type NotebookDocument = {
  cells: NotebookCell[];
  metadata: Record<string, unknown>;
  nbformat: number;
  nbformat_minor: number;
};

function isCellType(value: unknown): value is CellType {
  return value === "code" || value === "markdown" || value === "raw";
}

function parseCell(value: unknown, index: number): NotebookCell {
  if (!isRecord(value) || !isCellType(value.cell_type)) {
    throw new Error(`cell ${index} is not a notebook cell`);
  }
  const { source, metadata } = value;
  if (typeof source !== "string" && !isStringArray(source)) {
    throw new Error(`cell ${index} has an invalid source`);
  }
  const cell: NotebookCell = { cell_type: value.cell_type, source };
  for (const [key, x] of Object.entries(value)) {
    if (!(key in cell) && key !== "metadata") cell[key] = x;
  }
  if (metadata == null) return cell;
  if (!isRecord(metadata)) {
    throw new Error(`cell ${index} has invalid metadata`);
  }
  const meta: CellMetadata = {};
  for (const [key, x] of Object.entries(metadata)) {
    if (key !== "tags") meta[key] = x;
  }
  if (metadata.tags != null) {
    if (!isStringArray(metadata.tags)) {
      throw new Error(`cell ${index} has invalid tags`);
    }
    meta.tags = metadata.tags;
  }
  cell.metadata = meta;
  return cell;
}

export function parseNotebook(json: string): NotebookDocument {
  const value: unknown = JSON.parse(json);
  if (!isRecord(value) || !Array.isArray(value.cells)) {
    throw new Error("not a notebook: missing cells");
  }
  const metadata = isRecord(value.metadata) ? value.metadata : {};
  return {
    ...value,
    cells: value.cells.map(parseCell),
    metadata,
    nbformat: typeof value.nbformat === "number" ? value.nbformat : 4,
    nbformat_minor:
      typeof value.nbformat_minor === "number" ? value.nbformat_minor : 5,
  };
}

export async function readNotebook(path: string): Promise<NotebookDocument> {
  const json = await readFile(path, "utf8");
  try {
    return parseNotebook(json);
  } catch (err) {
    throw new Error(`${path}: ${err instanceof Error ? err.message : err}`);
  }
}

export function sourceText(cell: NotebookCell): string {
  return Array.isArray(cell.source) ? cell.source.join("") : cell.source;
}

// Split into lines the way nbformat stores them, keeping line endings.
export function sourceLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

export function cellTags(cell: NotebookCell): string[] {
  return cell.metadata?.tags ?? [];
}

function sortKeys(_key: string, value: unknown): unknown {
  if (!isRecord(value)) return value;
  return Object.fromEntries(Object.keys(value).sort().map((k) => [k, value[k]]));
}

/**
 * Serialize with the layout Jupyter itself writes: sorted keys, one space
 * of indent, source as a list of lines and a trailing newline.
 */
export function serializeNotebook(notebook: NotebookDocument): string {
  const cells = notebook.cells.map((cell) => ({
    ...cell,
    source: sourceLines(sourceText(cell)),
  }));
  return `${JSON.stringify({ ...notebook, cells }, sortKeys, 1)}\n`;
}

export async function writeNotebook(
  path: string,
  notebook: NotebookDocument,
): Promise<void> {
  await writeFile(path, serializeNotebook(notebook), "utf8");
}
