/*
Scaffold a new use case directory: an example template notebook, an
example params.json to fill in and an empty notebooks/ directory.
*/

import { mkdir, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";

import getLogger from "@nbperf/backend/logger";
import { writeNotebook, type NotebookCell, type NotebookDocument } from "@nbperf/util/notebook-format";
import { hasErrorCode } from "@nbperf/util/misc";
import type { ParameterGrid } from "@nbperf/util/parameter-grid";

import {
  NOTEBOOK_TEMPLATE_FILENAME,
  OUTPUT_DIR,
  PARAMETERS_TAG,
  PARAMS_FILENAME,
} from "./generator";
import { SKIP_PROFILING_TAG, WAIT_FOR_VIZ_TAG } from "./inspect";

const logger = getLogger("jupyter:usecase");

export const EXAMPLE_PARAMS: ParameterGrid = {
  paramA_value: [1, 2, 3],
  paramB_value: ["x", "y", "z"],
  paramC_value: [true, false],
};

function codeCell(source: string, tags: string[] = []): NotebookCell {
  return {
    cell_type: "code",
    execution_count: null,
    metadata: tags.length > 0 ? { tags } : {},
    outputs: [],
    source,
  };
}

export function exampleTemplate(): NotebookDocument {
  return {
    cells: [
      codeCell("import numpy as np\nfrom jdaviz import Imviz", [SKIP_PROFILING_TAG]),
      codeCell(
        [
          "paramA_value = {paramA_value}",
          "paramB_value = {paramB_value!r}",
          "paramC_value = {paramC_value}",
          "# download throughput in bytes per second while profiling",
          "ui_network_throttling = None",
        ].join("\n"),
        [PARAMETERS_TAG],
      ),
      codeCell("imviz = Imviz()\nimviz.show()"),
      codeCell(
        [
          "data = np.random.default_rng(paramA_value).random((1000, 1000))",
          "imviz.load_data(data, data_label=f'{{paramB_value}}')",
        ].join("\n"),
        [WAIT_FOR_VIZ_TAG],
      ),
      codeCell(
        "if paramC_value:\n    imviz.default_viewer._obj.zoom_level = 2",
        [WAIT_FOR_VIZ_TAG],
      ),
    ],
    metadata: {
      kernelspec: {
        display_name: "Python 3 (ipykernel)",
        language: "python",
        name: "python3",
      },
      language_info: { name: "python" },
    },
    nbformat: 4,
    nbformat_minor: 5,
  };
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      return false;
    }
    throw err;
  }
}

/**
 * Create `<usecasesDir>/<name>` and return its path. Refuses an empty name
 * or an existing directory.
 */
export async function createUsecase(usecasesDir: string, name: string): Promise<string> {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new Error("the use case name cannot be empty or whitespace");
  }
  if (trimmed.includes("/") || trimmed === "." || trimmed === "..") {
    throw new Error(`invalid use case name '${trimmed}'`);
  }
  const dir = join(usecasesDir, trimmed);
  if (await exists(dir)) {
    throw new Error(`the use case directory '${dir}' already exists`);
  }
  await mkdir(join(dir, OUTPUT_DIR), { recursive: true });
  await writeFile(join(dir, OUTPUT_DIR, ".keep"), "");
  await writeNotebook(join(dir, NOTEBOOK_TEMPLATE_FILENAME), exampleTemplate());
  await writeFile(
    join(dir, PARAMS_FILENAME),
    `${JSON.stringify(EXAMPLE_PARAMS, null, 4)}\n`,
    "utf8",
  );
  logger.info(`new use case created in ${dir}`);
  return dir;
}
