import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import getLogger from "@nbperf/backend/logger";

import type { ScreenshotLogger } from "./viz-element";

const logger = getLogger("profiler:screenshots");

export const SCREENSHOTS_DIR = "screenshots";

/**
 * A screenshot logger saving `<ts>_cell<index>_<i>.png` files into `dir`.
 * Failures are logged and otherwise ignored, so they never stop a cell.
 */
export function screenshotLogger(
  dir: string,
  timestamp: () => string = () => `${process.hrtime.bigint()}`,
): ScreenshotLogger {
  return async (cellIndex, screenshots) => {
    try {
      await mkdir(dir, { recursive: true });
      const prefix = join(dir, `${timestamp()}_cell${cellIndex}`);
      for (const [i, png] of screenshots.entries()) {
        await writeFile(`${prefix}_${i}.png`, png);
      }
      logger.debug(`logged ${screenshots.length} screenshots for cell ${cellIndex}`);
    } catch (err) {
      logger.error(`failed to log screenshots for cell ${cellIndex}`, err);
    }
  };
}
