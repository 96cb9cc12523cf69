import {
  DEFAULT_MAX_WAIT_TIME,
  envEnabled,
  envNumber,
  normalizeUrl,
  resolveProfilerConfig,
} from "./config";

const ENV = {
  NBPERF_URL: "localhost:8888/",
  NBPERF_TOKEN: "test-secret",
  NBPERF_KERNEL_NAME: "python3",
};

describe("env helpers", () => {
  it("parses numbers with a fallback", () => {
    expect(envNumber({ N: "12.5" }, "N", 1)).toBe(12.5);
    expect(envNumber({ N: " " }, "N", 1)).toBe(1);
    expect(envNumber({ N: "abc" }, "N", 1)).toBe(1);
    expect(envNumber({}, "N", 1)).toBe(1);
  });

  it("parses booleans with a fallback", () => {
    expect(envEnabled({ B: "YES" }, "B")).toBe(true);
    expect(envEnabled({ B: "off" }, "B", true)).toBe(false);
    expect(envEnabled({ B: "maybe" }, "B", true)).toBe(true);
    expect(envEnabled({}, "B")).toBe(false);
  });

  it("normalizes urls", () => {
    expect(normalizeUrl("localhost:8888/")).toBe("http://localhost:8888");
    expect(normalizeUrl(" https://lab.test// ")).toBe("https://lab.test");
    expect(() => normalizeUrl("  ")).toThrow("empty url");
  });
});

describe("resolveProfilerConfig", () => {
  it("reads the environment with defaults", () => {
    expect(resolveProfilerConfig({}, ENV)).toEqual({
      url: "http://localhost:8888",
      token: "test-secret",
      kernel_name: "python3",
      headless: true,
      max_wait_time: DEFAULT_MAX_WAIT_TIME,
      log_screenshots: false,
      save_metrics: false,
    });
  });

  it("lets options override the environment", () => {
    const config = resolveProfilerConfig(
      {
        url: "https://other.test",
        kernelName: "xeus",
        headed: true,
        maxWaitTime: "45",
        saveMetrics: true,
      },
      { ...ENV, NBPERF_MAX_WAIT_TIME: "10", NBPERF_LOG_SCREENSHOTS: "1" },
    );
    expect(config).toMatchObject({
      url: "https://other.test",
      kernel_name: "xeus",
      headless: false,
      max_wait_time: 45,
      log_screenshots: true,
      save_metrics: true,
    });
  });

  it("uses the max wait time from the environment", () => {
    expect(resolveProfilerConfig({}, { ...ENV, NBPERF_MAX_WAIT_TIME: "10" }).max_wait_time).toBe(10);
  });

  it("requires url, token and kernel name", () => {
    expect(() => resolveProfilerConfig({}, { ...ENV, NBPERF_TOKEN: "" })).toThrow(
      "missing --token (or set NBPERF_TOKEN)",
    );
    expect(() => resolveProfilerConfig({}, {})).toThrow("missing --url (or set NBPERF_URL)");
  });

  it("rejects a bad max wait time option", () => {
    expect(() => resolveProfilerConfig({ maxWaitTime: "soon" }, ENV)).toThrow(
      "invalid max wait time 'soon' (expected a positive number of seconds)",
    );
  });
});
