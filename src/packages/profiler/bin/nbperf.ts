#!/usr/bin/env node
/*
nbperf: generate parameterized notebooks from a use case directory and
profile them in JupyterLab through a browser.

Examples:

  nbperf new-usecase imviz-load --dir usecases
  nbperf generate usecases/imviz-load
  NBPERF_URL=localhost:8888 NBPERF_TOKEN=... nbperf run usecases/imviz-load \
    --kernel-name python3 --save-metrics
  nbperf profile usecases/imviz-load/notebooks/*.ipynb --json
*/

import { AsciiTable3 } from "ascii-table3";
import { Command } from "commander";

import { parseLogLevel, setLogFile, setLogLevel } from "@nbperf/backend/logger";
import { generateNotebooks } from "@nbperf/jupyter/generator";
import { createUsecase } from "@nbperf/jupyter/usecase";

import { resolveProfilerConfig, type ProfilerOptions } from "../config";
import { generateAndProfile, profileNotebooks } from "../generate-and-profile";
import type { NotebookProfile } from "../profile-notebook";

const VERSION = "0.1.0";

type GlobalOptions = {
  logLevel?: string;
  logFile?: string;
  json?: boolean;
};

function fmt(value: number | undefined): string {
  return value == null || Number.isNaN(value) ? "n/a" : value.toFixed(2);
}

export function summaryTable(profiles: NotebookProfile[]): string {
  const table = new AsciiTable3("Notebook Profiles");
  table.setHeading(
    "Notebook",
    "Status",
    "Cells",
    "Time (s)",
    "Data (MB)",
    "Client CPU %",
    "Kernel CPU %",
    "Kernel Mem % max",
  );
  for (const { notebook, completed, metrics } of profiles) {
    table.addRow(
      notebook,
      completed ? "completed" : "aborted",
      `${metrics.executed_cells}/${metrics.total_cells}`,
      fmt(metrics.total_execution_time),
      fmt(metrics.client_total_data_received),
      fmt(metrics.client_mean_cpu),
      fmt(metrics.kernel_mean_cpu),
      fmt(metrics.kernel_max_memory),
    );
  }
  table.setAlignLeft(0);
  table.setAlignLeft(1);
  for (let i = 2; i <= 7; i += 1) {
    table.setAlignRight(i);
  }
  return table.toString();
}

function report(profiles: NotebookProfile[], json: boolean | undefined): void {
  if (json) {
    console.log(JSON.stringify(profiles, null, 2));
  } else {
    console.log(summaryTable(profiles));
  }
  if (profiles.some((p) => !p.completed)) {
    process.exitCode = 1;
  }
}

function globals(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

// Report failures the same way for every command.
function action<A extends unknown[]>(
  fn: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      console.error(`nbperf failed: ${err instanceof Error ? err.message : err}`);
      process.exitCode = 1;
    }
  };
}

function withProfilerOptions(command: Command): Command {
  return command
    .option("--url <url>", "JupyterLab server url (also NBPERF_URL)")
    .option("--token <token>", "JupyterLab token (also NBPERF_TOKEN)")
    .option(
      "--kernel-name <name>",
      "kernel to restart before each notebook (also NBPERF_KERNEL_NAME)",
    )
    .option("--headed", "show the browser window")
    .option(
      "--max-wait-time <seconds>",
      "seconds a cell may run before it times out (default: 300)",
    )
    .option("--log-screenshots", "save the screenshots taken for stability checks")
    .option("--save-metrics", "append metrics to the use case's CSV files");
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("nbperf")
    .description("generate and profile parameterized Jupyter notebooks")
    .version(VERSION)
    .option("--log-level <level>", "error, warn, info or debug (default: info)")
    .option("--log-file <path>", "also append log lines to this file")
    .option("--json", "output machine-readable JSON")
    .hook("preAction", (_program, actionCommand) => {
      const { logLevel, logFile } = globals(actionCommand);
      if (logLevel != null) {
        setLogLevel(parseLogLevel(logLevel));
      }
      setLogFile(logFile);
    });

  program
    .command("new-usecase <name>")
    .description("create a use case directory with an example template and params.json")
    .option("--dir <path>", "directory holding the use cases", "usecases")
    .action(
      action(async (name: string, opts: { dir: string }, command: Command) => {
        const dir = await createUsecase(opts.dir, name);
        console.log(globals(command).json ? JSON.stringify({ dir }) : dir);
      }),
    );

  program
    .command("generate <dir>")
    .description("generate one notebook per parameter combination into <dir>/notebooks")
    .action(
      action(async (dir: string, _opts: object, command: Command) => {
        const paths = await generateNotebooks(dir);
        console.log(globals(command).json ? JSON.stringify(paths, null, 2) : paths.join("\n"));
      }),
    );

  withProfilerOptions(
    program.command("profile <notebooks...>").description("profile generated notebooks"),
  ).action(
    action(async (notebooks: string[], opts: ProfilerOptions, command: Command) => {
      const config = resolveProfilerConfig(opts);
      report(await profileNotebooks(notebooks, config), globals(command).json);
    }),
  );

  withProfilerOptions(
    program
      .command("run <dir>")
      .description("generate the notebooks of a use case, then profile each of them"),
  ).action(
    action(async (dir: string, opts: ProfilerOptions, command: Command) => {
      const config = resolveProfilerConfig(opts);
      report(await generateAndProfile(dir, config), globals(command).json);
    }),
  );

  return program;
}

async function main() {
  await buildProgram().parseAsync(process.argv);
}

if (require.main === module) {
  main().catch((err) => {
    console.error(`nbperf failed: ${err instanceof Error ? err.message : err}`);
    process.exitCode = 1;
  });
}
