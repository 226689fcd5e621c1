/**
 * Text (and optionally image) in, text out. Implementations own timeouts and
 * retries and reject with `ReasoningError` once those are spent.
 */
export interface ReasoningCapability {
  generateText(prompt: string): Promise<string>;
  generateFromImageAndText(image: Uint8Array, prompt: string): Promise<string>;
}

/** One raw round trip to a model, without retry or timeout handling. */
export interface ReasoningTransport {
  complete(prompt: string, image?: Uint8Array): Promise<string>;
}
