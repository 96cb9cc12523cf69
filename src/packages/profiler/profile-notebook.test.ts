import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";

import { writeNotebook, type NotebookCell } from "@nbperf/util/notebook-format";
import { PyFloat } from "@nbperf/util/python-format";

import type { OpenNotebookOptions } from "./browser";
import type { ProfilerConfig } from "./config";
import { CellCountMismatchError } from "./errors";
import { generateAndProfile } from "./generate-and-profile";
import {
  downloadThroughput,
  profileNotebook,
  usecaseDir,
  type JupyterLabApi,
  type OpenedNotebook,
  type ProfileNotebookDeps,
} from "./profile-notebook";

class FakeJupyterLab implements JupyterLabApi {
  calls: string[] = [];
  async clearAllSessions() {
    this.calls.push("clear");
  }
  async restartKernel(kernelName: string) {
    this.calls.push(`restart ${kernelName}`);
  }
  async uploadNotebook(path: string) {
    this.calls.push(`upload ${basename(path)}`);
    return basename(path);
  }
  async deleteNotebook(filename: string) {
    this.calls.push(`delete ${filename}`);
  }
  notebookUrl(filename: string) {
    return `http://jupyter.test/lab/tree/${filename}?token=test-secret`;
  }
  async getKernelIdForNotebook() {
    return "kernel-1";
  }
  async getKernelUsage() {
    return { pid: 11, kernel_cpu: 5, kernel_memory: 100, host_memory_total: 1000 };
  }
}

function code(source: string, tags: string[] = []): NotebookCell {
  return { cell_type: "code", source, metadata: { tags }, execution_count: null, outputs: [] };
}

const CONFIG: ProfilerConfig = {
  url: "http://jupyter.test",
  token: "test-secret",
  kernel_name: "python3",
  headless: true,
  max_wait_time: 60,
  log_screenshots: false,
  save_metrics: true,
};

describe("downloadThroughput", () => {
  it("reads the throttling parameter", () => {
    expect(downloadThroughput({ ui_network_throttling: 125000 })).toBe(125000);
    expect(downloadThroughput({ ui_network_throttling: new PyFloat(62500) })).toBe(62500);
    expect(downloadThroughput({ ui_network_throttling: null })).toBeUndefined();
    expect(downloadThroughput({ ui_network_throttling: "fast" })).toBeUndefined();
    expect(downloadThroughput({})).toBeUndefined();
  });
});

describe("usecaseDir", () => {
  it("is two levels above a generated notebook", () => {
    expect(usecaseDir("/work/demo/notebooks/demo-x1.ipynb")).toBe("/work/demo");
  });
});

describe("profiling notebooks", () => {
  let root: string;
  let dir: string;
  let client: FakeJupyterLab;
  let opened: OpenNotebookOptions[];
  let cellCount: number;
  let t: number;
  let deps: ProfileNotebookDeps;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "nbperf-profile-"));
    dir = join(root, "demo");
    await mkdir(dir);
    await writeNotebook(join(dir, "template.ipynb"), {
      cells: [
        code("x_value = {x_value}\nui_network_throttling = 500000", ["parameters"]),
        code("print(x_value)"),
      ],
      metadata: {},
      nbformat: 4,
      nbformat_minor: 5,
    });
    await writeFile(join(dir, "params.json"), JSON.stringify({ x_value: [1, 2] }));

    client = new FakeJupyterLab();
    opened = [];
    cellCount = 2;
    t = 0;
    const openNotebook = async (opts: OpenNotebookOptions): Promise<OpenedNotebook> => {
      opened.push(opts);
      return {
        codeCells: async () =>
          Array.from({ length: cellCount }, () => ({
            run: async () => undefined,
            outputText: async () => "DONE",
          })),
        findVizElement: async () => undefined,
        close: async () => {
          client.calls.push("close");
        },
      };
    };
    deps = {
      client,
      openNotebook,
      sampler: { sample: () => ({ cpu: 1, memory: 2 }) },
      now: () => t,
      sleep: async (ms: number) => {
        t += ms;
      },
    };
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("generates, then profiles every notebook in turn", async () => {
    const profiles = await generateAndProfile(dir, CONFIG, deps);

    expect(profiles.map((p) => [p.notebook, p.completed])).toEqual([
      ["demo-x1.ipynb", true],
      ["demo-x2.ipynb", true],
    ]);
    expect(client.calls).toEqual([
      "clear",
      "restart python3",
      "upload demo-x1.ipynb",
      "close",
      "delete demo-x1.ipynb",
      "clear",
      "restart python3",
      "upload demo-x2.ipynb",
      "close",
      "delete demo-x2.ipynb",
    ]);
    expect(opened.map((o) => [o.url, o.downloadThroughput])).toEqual([
      ["http://jupyter.test/lab/tree/demo-x1.ipynb?token=test-secret", 500000],
      ["http://jupyter.test/lab/tree/demo-x2.ipynb?token=test-secret", 500000],
    ]);

    const [first] = profiles;
    expect(first.cells).toHaveLength(2);
    expect(first.metrics.executed_cells).toBe(2);
    expect(first.metrics.kernel_mean_memory).toBe(10);
    expect(first.metrics.client_total_data_received).toBe(0);
  });

  it("appends metrics to the use case's CSV files", async () => {
    await generateAndProfile(dir, CONFIG, deps);
    const notebooks = await readFile(join(dir, "metrics", "notebook_metrics.csv"), "utf8");
    const rows = notebooks.trimEnd().split("\n");
    expect(rows).toHaveLength(3);
    expect(rows[1].split(",").slice(0, 3)).toEqual(["demo-x1.ipynb", "1", "500000"]);
    const cells = await readFile(join(dir, "metrics", "cell_metrics.csv"), "utf8");
    expect(cells.trimEnd().split("\n")).toHaveLength(5);
  });

  it("cleans up when the page does not match the notebook", async () => {
    cellCount = 1;
    const profiles = generateAndProfile(dir, { ...CONFIG, save_metrics: false }, deps);
    await expect(profiles).rejects.toBeInstanceOf(CellCountMismatchError);
    expect(client.calls.slice(-2)).toEqual(["close", "delete demo-x1.ipynb"]);
  });

  it("profiles a single notebook without writing metrics", async () => {
    await generateAndProfile(dir, { ...CONFIG, save_metrics: false }, deps);
    client.calls = [];
    const profile = await profileNotebook(
      join(dir, "notebooks", "demo-x2.ipynb"),
      { ...CONFIG, save_metrics: false },
      deps,
    );
    expect(profile.completed).toBe(true);
    expect(client.calls).toContain("delete demo-x2.ipynb");
    await expect(readFile(join(dir, "metrics", "cell_metrics.csv"))).rejects.toThrow();
  });
});
