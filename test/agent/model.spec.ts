import { withTimeout } from "../../lib/agent/model";

describe("withTimeout", () => {
  it("passes through a value that arrives in time", async () => {
    await expect(withTimeout(Promise.resolve("ok"), 1_000)).resolves.toBe("ok");
  });

  it("passes through the original rejection", async () => {
    await expect(withTimeout(Promise.reject(new Error("quota exceeded")), 1_000)).rejects.toThrow("quota exceeded");
  });

  it("rejects with the label once the deadline passes", async () => {
    const never = new Promise<string>(() => undefined);

    await expect(withTimeout(never, 10, "responses.create")).rejects.toThrow("responses.create timed out after 10ms");
  });
});
