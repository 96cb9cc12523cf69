/*
Playwright (chromium) view of a notebook opened in JupyterLab.

The page is made very tall so that every cell is rendered without scrolling,
and the pulsing viewer label animation is disabled since it would keep
stability screenshots from ever matching. Network traffic is observed through
the Chrome DevTools Protocol and recorded into a NetworkLog.
*/

import type { Browser, BrowserContext, Locator, Page } from "@playwright/test";

import getLogger from "@nbperf/backend/logger";

import type { CellHandle } from "./cell-executor";
import { websocketPayloadBytes, type NetworkLog } from "./network-log";
import type { NotebookPage } from "./notebook-profiler";

const logger = getLogger("profiler:browser");

export const VIEWPORT = { width: 1600, height: 20000 };

export const PAGE_STYLE = ".viewer-label.pulse {animation: none !important;}";

export const NOTEBOOK_SELECTOR = ".jp-Notebook";
export const CODE_CELLS_SELECTOR =
  ".jp-WindowedPanel-viewport>.lm-Widget.jp-Cell.jp-CodeCell.jp-Notebook-cell";
export const OUTPUT_SELECTOR = ".lm-Widget.lm-Panel.jp-Cell-outputWrapper";
export const OUTPUT_TEXT_SELECTOR =
  ".lm-Widget.jp-RenderedText.jp-mod-trusted.jp-OutputArea-output";
// the imviz viewer of the jdaviz widget
export const VIZ_ELEMENT_SELECTOR = ".jdaviz.imviz";

export const LOAD_ATTEMPTS = 5;
export const LOAD_TIMEOUT_MS = 10_000;

export interface LoadOptions {
  attempts?: number;
  timeoutMs?: number;
  jitter?: () => number;
}

/**
 * Wait until the notebook is visible, retrying with a doubling timeout plus
 * up to a second of jitter.
 */
export async function waitForNotebookToLoad(
  waitVisible: (timeoutMs: number) => Promise<void>,
  {
    attempts = LOAD_ATTEMPTS,
    timeoutMs = LOAD_TIMEOUT_MS,
    jitter = () => Math.random() * 1000,
  }: LoadOptions = {},
): Promise<void> {
  let timeout = timeoutMs + jitter();
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      await waitVisible(timeout);
      logger.debug("notebook loaded");
      return;
    } catch (err) {
      logger.warn(`notebook not loaded yet, attempt ${attempt}/${attempts}`, `${err}`);
    }
    timeout = timeout * 2 + jitter();
  }
  throw new Error(`notebook did not load after ${attempts} attempts`);
}

class BrowserCell implements CellHandle {
  constructor(
    private readonly page: Page,
    private readonly locator: Locator,
  ) {}

  async run(): Promise<void> {
    await this.locator.click();
    await this.page.keyboard.press("Shift+Enter");
  }

  async outputText(): Promise<string> {
    const texts = await this.locator
      .locator(`${OUTPUT_SELECTOR} ${OUTPUT_TEXT_SELECTOR}`)
      .allInnerTexts();
    return texts.join("\n");
  }
}

export interface OpenNotebookOptions {
  url: string;
  headless: boolean;
  networkLog: NetworkLog;
  // download throughput in bytes per second
  downloadThroughput?: number;
  load?: LoadOptions;
}

export class BrowserNotebook implements NotebookPage {
  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    readonly page: Page,
  ) {}

  static async open({
    url,
    headless,
    networkLog,
    downloadThroughput,
    load,
  }: OpenNotebookOptions): Promise<BrowserNotebook> {
    const { chromium } = await import("@playwright/test");
    const browser = await chromium.launch({ headless });
    try {
      const context = await browser.newContext({ viewport: VIEWPORT });
      const page = await context.newPage();
      const nb = new BrowserNotebook(browser, context, page);

      const cdp = await context.newCDPSession(page);
      await cdp.send("Network.enable");
      cdp.on("Network.dataReceived", ({ dataLength }) => {
        networkLog.record(dataLength);
      });
      cdp.on("Network.webSocketFrameReceived", ({ response }) => {
        networkLog.record(websocketPayloadBytes(response.opcode, response.payloadData));
      });

      logger.info(`navigating to ${url.replace(/token=[^&]*/, "token=...")}`);
      await page.goto(url);
      await waitForNotebookToLoad(
        (timeout) =>
          page.locator(NOTEBOOK_SELECTOR).first().waitFor({ state: "visible", timeout }),
        load,
      );

      if (downloadThroughput != null) {
        logger.info(`throttling downloads to ${downloadThroughput} bytes/s`);
        await cdp.send("Network.emulateNetworkConditions", {
          offline: false,
          latency: 0,
          downloadThroughput,
          uploadThroughput: -1,
        });
      }
      await page.addStyleTag({ content: PAGE_STYLE });
      logger.debug("page style added");
      return nb;
    } catch (err) {
      await browser.close();
      throw err;
    }
  }

  async codeCells(): Promise<CellHandle[]> {
    const cells = await this.page.locator(CODE_CELLS_SELECTOR).all();
    return cells.map((cell) => new BrowserCell(this.page, cell));
  }

  // The visualization element, if the page shows one.
  async findVizElement(): Promise<Locator | undefined> {
    const viz = this.page.locator(VIZ_ELEMENT_SELECTOR).first();
    return (await viz.count()) > 0 ? viz : undefined;
  }

  async close(): Promise<void> {
    await this.context.close();
    await this.browser.close();
    logger.debug("browser closed");
  }
}
