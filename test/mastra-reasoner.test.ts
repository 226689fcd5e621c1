import { describe, expect, it, vi } from "vitest";
import { fixedBackoff } from "../src/core/retry-policy.js";
import { MastraReasoner } from "../src/reasoning/mastra-reasoner.js";
import type { ReasoningTransport } from "../src/reasoning/types.js";
import { ReasoningError } from "../src/utils/errors.js";
import { FakeClock } from "./helpers.js";

describe("MastraReasoner", () => {
  it("passes text prompts and images to the transport", async () => {
    const complete = vi.fn<(prompt: string, image?: Uint8Array) => Promise<string>>().mockResolvedValue("ok");
    const reasoner = new MastraReasoner({ complete }, { clock: new FakeClock() });
    const image = new Uint8Array([1]);

    await expect(reasoner.generateText("hi")).resolves.toBe("ok");
    await expect(reasoner.generateFromImageAndText(image, "look")).resolves.toBe("ok");

    expect(complete.mock.calls).toEqual([["hi", undefined], ["look", image]]);
  });

  it("retries with the policy delay and succeeds", async () => {
    const complete = vi
      .fn<(prompt: string, image?: Uint8Array) => Promise<string>>()
      .mockRejectedValueOnce(new Error("429"))
      .mockResolvedValueOnce("done");
    const clock = new FakeClock();
    const reasoner = new MastraReasoner({ complete }, { clock, retryPolicy: fixedBackoff(2000, 2) });

    await expect(reasoner.generateText("hi")).resolves.toBe("done");
    expect(clock.sleeps).toEqual([2000]);
  });

  it("raises a ReasoningError once the retries are spent", async () => {
    const transport: ReasoningTransport = {
      complete: async () => {
        throw new Error("503 unavailable");
      },
    };
    const clock = new FakeClock();
    const reasoner = new MastraReasoner(transport, {
      clock,
      retryPolicy: fixedBackoff(100, 2),
      label: "planner",
    });

    const result = reasoner.generateText("hi");
    await expect(result).rejects.toBeInstanceOf(ReasoningError);
    await expect(result).rejects.toThrow("planner failed after 3 attempt(s): 503 unavailable");
    expect(clock.sleeps).toEqual([100, 100]);
  });

  it("times out a hanging call", async () => {
    const transport: ReasoningTransport = { complete: () => new Promise<string>(() => {}) };
    const reasoner = new MastraReasoner(transport, {
      clock: new FakeClock(),
      retryPolicy: fixedBackoff(0, 0),
      timeoutMs: 5,
    });
    await expect(reasoner.generateText("hi")).rejects.toThrow(
      "reasoning failed after 1 attempt(s): reasoning call timed out after 5ms"
    );
  });
});
