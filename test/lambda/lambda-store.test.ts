import { describe, it, expect } from "vitest";
import { LambdaStore } from "../../src/lambda/lambdaStore.ts";

const REQUEST = { functionName: "notify", region: "us-east-1", accountId: "000000000000" };

describe("LambdaStore", () => {
  it("records invocations and runs the handler", async () => {
    const store = new LambdaStore();
    const payloads: string[] = [];
    store.registerFunction("notify", { handler: (payload) => void payloads.push(payload) });

    await store.invoke({ ...REQUEST, payload: "{}", qualifier: "live", subject: "s" });

    expect(payloads).toEqual(["{}"]);
    expect(store.getFunction("notify")?.invocations).toEqual([
      expect.objectContaining({ functionName: "notify", qualifier: "live", payload: "{}", subject: "s" }),
    ]);
  });

  it("replaces the handler when registered again", async () => {
    const store = new LambdaStore();
    const first = store.registerFunction("notify", {
      handler: () => {
        throw new Error("old handler");
      },
    });
    const second = store.registerFunction("notify", { handler: async () => {} });

    expect(second).toBe(first);
    await expect(store.invoke({ ...REQUEST, payload: "{}" })).resolves.toBeUndefined();
  });

  it("propagates handler failures", async () => {
    const store = new LambdaStore();
    store.registerFunction("notify", {
      handler: async () => {
        throw new Error("handler failed");
      },
    });
    await expect(store.invoke({ ...REQUEST, payload: "{}" })).rejects.toThrow("handler failed");
    expect(store.getFunction("notify")?.invocations).toHaveLength(1);
  });

  it("rejects unknown functions", async () => {
    const store = new LambdaStore();
    await expect(store.invoke({ ...REQUEST, payload: "{}" })).rejects.toMatchObject({
      code: "ResourceNotFoundException",
      message: "Function not found: arn:aws:lambda:us-east-1:000000000000:function:notify",
    });
  });
});
