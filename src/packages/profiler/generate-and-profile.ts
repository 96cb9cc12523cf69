/*
A whole campaign: generate every notebook of a use case directory, then
profile them one after the other.
*/

import getLogger from "@nbperf/backend/logger";
import { generateNotebooks } from "@nbperf/jupyter/generator";

import type { ProfilerConfig } from "./config";
import { profileNotebook, type NotebookProfile, type ProfileNotebookDeps } from "./profile-notebook";

const logger = getLogger("profiler:generate-and-profile");

export async function profileNotebooks(
  paths: string[],
  config: ProfilerConfig,
  deps: ProfileNotebookDeps = {},
): Promise<NotebookProfile[]> {
  const profiles: NotebookProfile[] = [];
  for (const [i, path] of paths.entries()) {
    logger.info(`notebook ${i + 1}/${paths.length}: ${path}`);
    profiles.push(await profileNotebook(path, config, deps));
  }
  return profiles;
}

export async function generateAndProfile(
  inputDir: string,
  config: ProfilerConfig,
  deps: ProfileNotebookDeps = {},
): Promise<NotebookProfile[]> {
  const paths = await generateNotebooks(inputDir);
  logger.info(`generated ${paths.length} notebooks in ${inputDir}`);
  return await profileNotebooks(paths, config, { outputDir: inputDir, ...deps });
}
