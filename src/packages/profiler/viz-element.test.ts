import { STABILITY_INTERVAL_MS, VizElement, type Screenshottable } from "./viz-element";

function screen(...frames: string[]): Screenshottable {
  let i = 0;
  return {
    screenshot: async () => Buffer.from(frames[i++]),
  };
}

describe("VizElement", () => {
  const sleeps: number[] = [];
  const sleep = async (ms: number) => {
    sleeps.push(ms);
  };

  beforeEach(() => {
    sleeps.length = 0;
  });

  it("is stable when two screenshots an interval apart match", async () => {
    const viz = new VizElement(screen("same", "same"), { sleep });
    expect(await viz.isStable(3)).toBe(true);
    expect(sleeps).toEqual([STABILITY_INTERVAL_MS]);
  });

  it("is not stable while the picture changes", async () => {
    const viz = new VizElement(screen("before", "after"), { sleep });
    expect(await viz.isStable(3)).toBe(false);
  });

  it("is never stable without an element", async () => {
    const viz = new VizElement(undefined, { sleep });
    expect(await viz.isStable(3)).toBe(false);
    expect(sleeps).toEqual([]);
  });

  it("hands both screenshots to the screenshot logger", async () => {
    const logged: [number, string[]][] = [];
    const viz = new VizElement(screen("a", "b"), {
      sleep,
      logScreenshots: async (cellIndex, shots) => {
        logged.push([cellIndex, shots.map((s) => s.toString())]);
      },
    });
    await viz.isStable(7);
    expect(logged).toEqual([[7, ["a", "b"]]]);
  });
});
