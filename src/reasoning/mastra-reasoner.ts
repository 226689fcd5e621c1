import type { Agent } from "@mastra/core/agent";
import type { Clock, RetryPolicy } from "../core/retry-policy.js";
import { fixedBackoff, systemClock } from "../core/retry-policy.js";
import { ReasoningError, errorMessage } from "../utils/errors.js";
import type { PilotLogger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import { withTimeout } from "../utils/timeout.js";
import type { ReasoningCapability, ReasoningTransport } from "./types.js";

/** Adapts a Mastra agent to the transport the reasoner drives. */
export function fromMastraAgent(agent: Agent): ReasoningTransport {
  return {
    async complete(prompt, image) {
      const res = image
        ? await agent.generate([
            {
              role: "user",
              content: [
                { type: "image", image, mimeType: "image/png" },
                { type: "text", text: prompt },
              ],
            },
          ])
        : await agent.generate([{ role: "user", content: prompt }]);
      return res.text;
    },
  };
}

export type MastraReasonerOptions = {
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  clock?: Clock;
  logger?: PilotLogger;
  label?: string;
};

export class MastraReasoner implements ReasoningCapability {
  private readonly transport: ReasoningTransport;
  private readonly timeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly clock: Clock;
  private readonly logger: PilotLogger;
  private readonly label: string;

  constructor(transport: ReasoningTransport, opts: MastraReasonerOptions = {}) {
    this.transport = transport;
    this.timeoutMs = opts.timeoutMs ?? 120000;
    this.retryPolicy = opts.retryPolicy ?? fixedBackoff(2000, 2);
    this.clock = opts.clock ?? systemClock;
    this.logger = opts.logger ?? silentLogger;
    this.label = opts.label ?? "reasoning";
  }

  generateText(prompt: string): Promise<string> {
    return this.call(prompt);
  }

  generateFromImageAndText(image: Uint8Array, prompt: string): Promise<string> {
    return this.call(prompt, image);
  }

  private async call(prompt: string, image?: Uint8Array): Promise<string> {
    const attempts = this.retryPolicy.maxAttempts + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const text = await withTimeout(
          this.transport.complete(prompt, image),
          this.timeoutMs,
          `${this.label} call`
        );
        if (attempt > 1) {
          this.logger.info("Reasoning call succeeded after retry", { attempt });
        }
        return text;
      } catch (error) {
        lastError = error;
        this.logger.warn("Reasoning call failed", {
          attempt,
          attempts,
          error: errorMessage(error),
        });
        if (attempt < attempts) {
          await this.clock.sleep(this.retryPolicy.delayMs(attempt));
        }
      }
    }

    throw new ReasoningError(
      `${this.label} failed after ${attempts} attempt(s): ${errorMessage(lastError)}`,
      lastError,
      attempts
    );
  }
}
