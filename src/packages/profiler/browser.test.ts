import { LOAD_ATTEMPTS, waitForNotebookToLoad } from "./browser";

describe("waitForNotebookToLoad", () => {
  it("doubles the timeout between attempts", async () => {
    const timeouts: number[] = [];
    await waitForNotebookToLoad(
      async (timeout) => {
        timeouts.push(timeout);
        if (timeouts.length < 3) throw new Error("not visible");
      },
      { timeoutMs: 1000, jitter: () => 10 },
    );
    expect(timeouts).toEqual([1010, 2030, 4070]);
  });

  it("gives up after the last attempt", async () => {
    let calls = 0;
    await expect(
      waitForNotebookToLoad(
        async () => {
          calls += 1;
          throw new Error("not visible");
        },
        { jitter: () => 0 },
      ),
    ).rejects.toThrow(`notebook did not load after ${LOAD_ATTEMPTS} attempts`);
    expect(calls).toBe(LOAD_ATTEMPTS);
  });
});
