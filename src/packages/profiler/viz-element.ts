/*
Visual stability of the rendered visualization widget.

The widget gives no signal when it has finished drawing, so it counts as
stable once two screenshots taken STABILITY_INTERVAL_MS apart are byte
identical. Any animation or late redraw reads as unstable; callers poll.
*/

import { delay } from "awaiting";

import getLogger from "@nbperf/backend/logger";

const logger = getLogger("profiler:viz-element");

export const STABILITY_INTERVAL_MS = 500;

export interface Screenshottable {
  screenshot(): Promise<Buffer>;
}

export type ScreenshotLogger = (cellIndex: number, screenshots: Buffer[]) => Promise<void>;

export interface VizElementOptions {
  logScreenshots?: ScreenshotLogger;
  sleep?: (ms: number) => Promise<unknown>;
}

export class VizElement {
  private readonly handle?: Screenshottable;
  private readonly logScreenshots?: ScreenshotLogger;
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(handle: Screenshottable | undefined, opts: VizElementOptions = {}) {
    this.handle = handle;
    this.logScreenshots = opts.logScreenshots;
    this.sleep = opts.sleep ?? delay;
  }

  async isStable(cellIndex: number): Promise<boolean> {
    if (this.handle == null) {
      logger.debug("no viz element, cannot be stable");
      return false;
    }
    const before = await this.handle.screenshot();
    await this.sleep(STABILITY_INTERVAL_MS);
    const after = await this.handle.screenshot();
    if (this.logScreenshots != null) {
      await this.logScreenshots(cellIndex, [before, after]);
    }
    const stable = before.equals(after);
    logger.debug(`cell ${cellIndex}: viz element stable: ${stable}`);
    return stable;
  }
}
