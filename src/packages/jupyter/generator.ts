/*
Generate concrete notebooks from a template notebook and a parameter grid.

A use case directory looks like

    <input_dir>/
      template.ipynb   the notebook; one code cell is tagged "parameters"
      params.json      {"name_value": [v1, v2, ...], ...}
      notebooks/       generated here, one notebook per combination

Every generated cell ends with a completion marker statement; the profiler
watches the cell output for it to know the cell's code has finished.
*/

import { access, mkdir, readFile, rm } from "node:fs/promises";
import { join, parse, resolve } from "node:path";

import getLogger from "@nbperf/backend/logger";
import {
  cellTags,
  readNotebook,
  sourceText,
  writeNotebook,
  type NotebookCell,
  type NotebookDocument,
} from "@nbperf/util/notebook-format";
import {
  expandParameterGrid,
  validateParameterGrid,
  type ParameterAssignment,
} from "@nbperf/util/parameter-grid";
import { parseJsonPreservingFloats, pyStr } from "@nbperf/util/python-format";

import {
  DuplicateParametersCellError,
  EmptyParametersCellError,
  ParametersCellMissingError,
} from "./errors";
import { formatTemplate, templateFields } from "./template";

const logger = getLogger("jupyter:generator");

export const PARAMETERS_TAG = "parameters";
export const COMPLETION_MARKER = 'print("DONE")';

export const NOTEBOOK_TEMPLATE_FILENAME = "template.ipynb";
export const PARAMS_FILENAME = "params.json";
export const OUTPUT_DIR = "notebooks";

/**
 * Append `statement` as the last line of `source` unless it already is.
 * Line endings are normalized to "\n" and a trailing newline is dropped.
 */
export function appendStatement(source: string, statement: string): string {
  const lines = source.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  if (lines[lines.length - 1] !== statement) lines.push(statement);
  return lines.join("\n");
}

function parametersCell(cells: NotebookCell[]): NotebookCell {
  const tagged = cells.filter((cell) => cellTags(cell).includes(PARAMETERS_TAG));
  if (tagged.length === 0) {
    throw new ParametersCellMissingError(PARAMETERS_TAG);
  }
  if (tagged.length > 1) {
    throw new DuplicateParametersCellError(PARAMETERS_TAG, tagged.length);
  }
  return tagged[0];
}

export class NotebookGenerator {
  private readonly template: NotebookDocument;

  constructor(template: NotebookDocument) {
    this.template = {
      ...structuredClone(template),
      cells: template.cells
        .filter((cell) => cell.cell_type === "code")
        .map((cell) => ({
          ...structuredClone(cell),
          outputs: [],
          execution_count: null,
          metadata: { ...structuredClone(cell.metadata ?? {}), editable: false },
        })),
    };
  }

  static async fromFile(path: string): Promise<NotebookGenerator> {
    return new NotebookGenerator(await readNotebook(path));
  }

  // Names the parameters cell refers to.
  parameterNames(): string[] {
    return templateFields(sourceText(parametersCell(this.template.cells)));
  }

  generate(assignment: ParameterAssignment): NotebookDocument {
    const notebook = structuredClone(this.template);
    const params = parametersCell(notebook.cells);
    const source = sourceText(params);
    if (source.trim() === "") {
      throw new EmptyParametersCellError(PARAMETERS_TAG);
    }
    params.source = formatTemplate(source, assignment);
    for (const cell of notebook.cells) {
      cell.source = appendStatement(sourceText(cell), COMPLETION_MARKER);
    }
    return notebook;
  }
}

/**
 * File name of the notebook generated for `assignment`: the base name
 * followed by `-<key><value>` for every parameter, `_value` suffixes dropped.
 */
export function notebookFilename(base: string, assignment: ParameterAssignment): string {
  let name = base;
  for (const [key, value] of Object.entries(assignment)) {
    name += `-${key.replace(/_value$/, "")}${pyStr(value)}`;
  }
  return `${name}.ipynb`;
}

async function ensureFile(path: string, what: string, dir: string): Promise<void> {
  try {
    await access(path);
  } catch (err) {
    logger.debug("access failed", path, err);
    throw new Error(`${what} file does not exist in ${dir}`);
  }
}

/**
 * Generate every notebook of the use case in `inputDir`, replacing existing
 * ones, and return their paths in grid order.
 */
export async function generateNotebooks(inputDir: string): Promise<string[]> {
  logger.debug("generating notebooks", { inputDir });
  const templatePath = join(inputDir, NOTEBOOK_TEMPLATE_FILENAME);
  const paramsPath = join(inputDir, PARAMS_FILENAME);
  const outputDir = join(inputDir, OUTPUT_DIR);

  await ensureFile(templatePath, NOTEBOOK_TEMPLATE_FILENAME, inputDir);
  await ensureFile(paramsPath, PARAMS_FILENAME, inputDir);
  await mkdir(outputDir, { recursive: true });

  const grid = validateParameterGrid(
    parseJsonPreservingFloats(await readFile(paramsPath, "utf8")),
    paramsPath,
  );
  const generator = await NotebookGenerator.fromFile(templatePath);

  const used = generator.parameterNames();
  const unused = Object.keys(grid).filter((key) => !used.includes(key));
  if (unused.length > 0) {
    logger.warn(
      `parameters not referenced by the template: ${unused.join(", ")}`,
    );
  }

  logger.info("generating profiler notebooks...");
  const base = parse(resolve(inputDir)).name;
  const paths: string[] = [];
  for (const assignment of expandParameterGrid(grid)) {
    const path = join(outputDir, notebookFilename(base, assignment));
    await rm(path, { force: true });
    await writeNotebook(path, generator.generate(assignment));
    paths.push(path);
  }
  logger.info(`notebook generation completed: ${paths.length} notebooks generated`);
  return paths;
}
