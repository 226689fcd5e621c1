import type { Clock } from "../src/core/retry-policy.js";
import type { Point, RawElementRecord, ScreenInfo } from "../src/core/types.js";
import type { DeviceCapability } from "../src/device/types.js";
import type { ReasoningCapability } from "../src/reasoning/types.js";

export type DeviceCall =
  | { type: "tap"; point: Point }
  | { type: "swipe"; start: Point; end: Point; durationMs: number }
  | { type: "input"; text: string }
  | { type: "key"; key: string }
  | { type: "launch"; packageId: string };

type FailingMethod = "tap" | "swipe" | "inputText" | "pressKey" | "launchApp" | "dumpUIHierarchy" | "screenshot";

export function el(
  text: string,
  bounds: [number, number, number, number],
  extra: Partial<RawElementRecord> = {}
): RawElementRecord {
  const [left, top, right, bottom] = bounds;
  return {
    text,
    className: "android.widget.TextView",
    packageName: "com.example.app",
    clickable: true,
    bounds: { left, top, right, bottom },
    ...extra,
  };
}

export function input(hint: string, bounds: [number, number, number, number]): RawElementRecord {
  return el("", bounds, { className: "android.widget.EditText", hint });
}

/**
 * Scriptable in-memory device. `react` runs after every recorded call and may
 * swap the screen.
 */
export class FakeDevice implements DeviceCapability {
  screen: RawElementRecord[];
  readonly calls: DeviceCall[] = [];
  connected = false;
  dumps = 0;
  screenshots = 0;
  private readonly failures = new Map<FailingMethod, Error[]>();
  private readonly react?: (call: DeviceCall, device: FakeDevice) => void;
  private readonly info: ScreenInfo;

  constructor(
    opts: {
      screen?: RawElementRecord[];
      react?: (call: DeviceCall, device: FakeDevice) => void;
      info?: ScreenInfo;
    } = {}
  ) {
    this.screen = opts.screen ?? [];
    this.react = opts.react;
    this.info = opts.info ?? { width: 1080, height: 1920, orientation: "portrait" };
  }

  failNext(method: FailingMethod, error: Error, times = 1) {
    const queue = this.failures.get(method) ?? [];
    for (let i = 0; i < times; i++) queue.push(error);
    this.failures.set(method, queue);
  }

  private check(method: FailingMethod) {
    const error = this.failures.get(method)?.shift();
    if (error) throw error;
  }

  private record(call: DeviceCall) {
    this.calls.push(call);
    this.react?.(call, this);
  }

  async connect() {
    this.connected = true;
  }

  async disconnect() {
    this.connected = false;
  }

  async isConnected() {
    return this.connected;
  }

  async screenInfo() {
    return this.info;
  }

  async screenshot() {
    this.check("screenshot");
    this.screenshots += 1;
    return new Uint8Array([137, 80, 78, 71]);
  }

  async tap(point: Point) {
    this.check("tap");
    this.record({ type: "tap", point });
  }

  async swipe(start: Point, end: Point, durationMs: number) {
    this.check("swipe");
    this.record({ type: "swipe", start, end, durationMs });
  }

  async inputText(text: string) {
    this.check("inputText");
    this.record({ type: "input", text });
  }

  async pressKey(key: string) {
    this.check("pressKey");
    this.record({ type: "key", key });
  }

  async dumpUIHierarchy() {
    this.check("dumpUIHierarchy");
    this.dumps += 1;
    return this.screen.map((record) => ({ ...record }));
  }

  async launchApp(packageId: string) {
    this.check("launchApp");
    this.record({ type: "launch", packageId });
  }
}

/** Clock whose sleeps return at once and advance `now`. */
export class FakeClock implements Clock {
  current = 0;
  readonly sleeps: number[] = [];

  now() {
    return this.current;
  }

  async sleep(ms: number) {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

/** Replays canned replies in order; an `Error` entry is thrown instead. */
export class ScriptedReasoner implements ReasoningCapability {
  readonly prompts: string[] = [];
  imageCalls = 0;
  private readonly replies: Array<string | Error>;

  constructor(replies: Array<string | Error>) {
    this.replies = [...replies];
  }

  private next(): string {
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error("No scripted reply left");
    if (reply instanceof Error) throw reply;
    return reply;
  }

  async generateText(prompt: string) {
    this.prompts.push(prompt);
    return this.next();
  }

  async generateFromImageAndText(_image: Uint8Array, prompt: string) {
    this.imageCalls += 1;
    this.prompts.push(prompt);
    return this.next();
  }
}

export const json = (value: unknown) => JSON.stringify(value);
