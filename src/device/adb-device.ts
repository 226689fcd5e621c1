import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { Point, RawElementRecord, ScreenInfo } from "../core/types.js";
import { DeviceConnectionError, DeviceError, errorMessage } from "../utils/errors.js";
import type { PilotLogger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import { parseHierarchyXml } from "./hierarchy.js";
import { normalizeKeyName, toKeyCode } from "./keys.js";
import type { DeviceCapability } from "./types.js";

const execFileAsync = promisify(execFile);

const DUMP_PATH = "/sdcard/window_dump.xml";
const ADB_KEYBOARD_ACTION = "ADB_INPUT_B64";
const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;
const CONNECTION_PATTERNS = [
  /device offline/i,
  /device '.*' not found/i,
  /device not found/i,
  /no devices\/emulators found/i,
  /no devices found/i,
  /cannot connect to daemon/i,
  /unauthorized/i,
];

export type CommandOutput = { stdout: Buffer; stderr: string };

/** Runs one host command; rejects when it exits non-zero. */
export type CommandRunner = (
  file: string,
  args: string[],
  opts: { timeoutMs: number }
) => Promise<CommandOutput>;

export const execFileRunner: CommandRunner = async (file, args, opts) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    encoding: "buffer",
    timeout: opts.timeoutMs,
    maxBuffer: 64 * 1024 * 1024,
  });
  return { stdout, stderr: stderr.toString("utf8") };
};

export type AdbDeviceOptions = {
  serial?: string;
  adbPath?: string;
  runner?: CommandRunner;
  /** `WIDTHxHEIGHT`; wins over `wm size`. */
  screenSizeOverride?: string;
  commandTimeoutMs?: number;
  logger?: PilotLogger;
};

export type AdbDeviceEntry = { serial: string; state: string; description: string };

export function classifyAdbError(error: unknown, context: string): DeviceError {
  if (error instanceof DeviceError) return error;
  const stderr =
    typeof error === "object" && error !== null && "stderr" in error ? String(error.stderr) : "";
  const detail = `${errorMessage(error)} ${stderr}`.trim();
  if (CONNECTION_PATTERNS.some((pattern) => pattern.test(detail))) {
    return new DeviceConnectionError(`${context}: ${detail}`, error);
  }
  return new DeviceError(`${context}: ${detail}`, error);
}

export function parseScreenSize(output: string): { width: number; height: number } | null {
  const override = /Override size:\s*(\d+)x(\d+)/.exec(output);
  const physical = /Physical size:\s*(\d+)x(\d+)/.exec(output);
  const bare = /^\s*(\d+)x(\d+)\s*$/.exec(output);
  const match = override ?? physical ?? bare;
  if (!match?.[1] || !match[2]) return null;
  return { width: Number(match[1]), height: Number(match[2]) };
}

export function parseDensity(output: string): number | undefined {
  const match = /(?:Override|Physical) density:\s*(\d+)/.exec(output);
  return match?.[1] ? Number(match[1]) : undefined;
}

/** Escapes text for `adb shell input text`; spaces become `%s`. */
export function escapeInputText(text: string) {
  return text.replace(/([\\"'`$&|;<>()*?!#~{}[\]])/g, "\\$1").replace(/ /g, "%s");
}

const isAscii = (text: string) => /^[\x20-\x7e]*$/.test(text);

export function parseAdbDevices(output: string): AdbDeviceEntry[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("*") && !line.startsWith("List of devices"))
    .flatMap((line) => {
      const [serial, state, ...rest] = line.split(/\s+/);
      return serial && state ? [{ serial, state, description: rest.join(" ") }] : [];
    });
}

export async function listAdbDevices(
  runner: CommandRunner = execFileRunner,
  adbPath = "adb"
): Promise<AdbDeviceEntry[]> {
  try {
    const { stdout } = await runner(adbPath, ["devices", "-l"], { timeoutMs: DEFAULT_COMMAND_TIMEOUT_MS });
    return parseAdbDevices(stdout.toString("utf8"));
  } catch (error) {
    throw classifyAdbError(error, "adb devices");
  }
}

/**
 * {@link DeviceCapability} over the `adb` binary. Every primitive is one or two
 * `adb` invocations; nothing is cached except the screen geometry.
 */
export class AdbDevice implements DeviceCapability {
  private readonly serial?: string;
  private readonly adbPath: string;
  private readonly runner: CommandRunner;
  private readonly sizeOverride?: string;
  private readonly timeoutMs: number;
  private readonly logger: PilotLogger;
  private connected = false;
  private screen?: ScreenInfo;

  constructor(opts: AdbDeviceOptions = {}) {
    this.serial = opts.serial;
    this.adbPath = opts.adbPath ?? "adb";
    this.runner = opts.runner ?? execFileRunner;
    this.sizeOverride = opts.screenSizeOverride;
    this.timeoutMs = opts.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.logger = opts.logger ?? silentLogger;
  }

  private async adb(args: string[], context: string): Promise<Buffer> {
    const full = this.serial ? ["-s", this.serial, ...args] : args;
    this.logger.debug("adb", { args: full });
    try {
      const { stdout } = await this.runner(this.adbPath, full, { timeoutMs: this.timeoutMs });
      return stdout;
    } catch (error) {
      throw classifyAdbError(error, context);
    }
  }

  private async shell(args: string[], context: string): Promise<string> {
    const out = await this.adb(["shell", ...args], context);
    return out.toString("utf8");
  }

  async connect() {
    const state = (await this.adb(["get-state"], "adb get-state")).toString("utf8").trim();
    if (state !== "device") {
      throw new DeviceConnectionError(`Device is ${state || "unavailable"}`);
    }
    this.connected = true;
    this.screen = await this.readScreenInfo();
    this.logger.info("Device connected", { serial: this.serial ?? "(default)", screen: this.screen });
  }

  async disconnect() {
    this.connected = false;
  }

  async isConnected() {
    try {
      const state = (await this.adb(["get-state"], "adb get-state")).toString("utf8").trim();
      this.connected = state === "device";
    } catch (error) {
      this.logger.debug("Device state check failed", { error: errorMessage(error) });
      this.connected = false;
    }
    return this.connected;
  }

  async screenInfo(): Promise<ScreenInfo> {
    if (!this.screen) {
      this.screen = await this.readScreenInfo();
    }
    return this.screen;
  }

  private async readScreenInfo(): Promise<ScreenInfo> {
    const size =
      (this.sizeOverride ? parseScreenSize(this.sizeOverride) : null) ??
      parseScreenSize(await this.shell(["wm", "size"], "wm size"));
    if (!size) {
      throw new DeviceError("Could not read the screen size");
    }
    let density: number | undefined;
    try {
      density = parseDensity(await this.shell(["wm", "density"], "wm density"));
    } catch (error) {
      this.logger.debug("Screen density unavailable", { error: errorMessage(error) });
    }
    const info: ScreenInfo = {
      ...size,
      orientation: size.width > size.height ? "landscape" : "portrait",
    };
    if (density !== undefined) info.density = density;
    return info;
  }

  async screenshot(): Promise<Uint8Array> {
    const png = await this.adb(["exec-out", "screencap", "-p"], "screencap");
    if (png.length === 0) {
      throw new DeviceError("screencap returned no data");
    }
    return new Uint8Array(png);
  }

  async tap(point: Point) {
    await this.shell(["input", "tap", String(point.x), String(point.y)], "input tap");
  }

  async swipe(start: Point, end: Point, durationMs: number) {
    await this.shell(
      ["input", "swipe", ...[start.x, start.y, end.x, end.y, Math.round(durationMs)].map(String)],
      "input swipe"
    );
  }

  async inputText(text: string) {
    if (isAscii(text)) {
      await this.shell(["input", "text", escapeInputText(text)], "input text");
      return;
    }
    // Non-ASCII text needs the ADB keyboard IME on the device.
    const encoded = Buffer.from(text, "utf8").toString("base64");
    await this.shell(
      ["am", "broadcast", "-a", ADB_KEYBOARD_ACTION, "--es", "msg", encoded],
      "adb keyboard broadcast"
    );
  }

  async pressKey(name: string) {
    const code = toKeyCode(name);
    if (!code) {
      throw new DeviceError(`Unknown key: ${normalizeKeyName(name)}`);
    }
    await this.shell(["input", "keyevent", code], "input keyevent");
  }

  async dumpUIHierarchy(): Promise<RawElementRecord[]> {
    await this.shell(["uiautomator", "dump", DUMP_PATH], "uiautomator dump");
    const xml = (await this.adb(["exec-out", "cat", DUMP_PATH], "read hierarchy dump")).toString("utf8");
    return parseHierarchyXml(xml);
  }

  async launchApp(packageId: string) {
    const out = await this.shell(
      ["monkey", "-p", packageId, "-c", "android.intent.category.LAUNCHER", "1"],
      "monkey launch"
    );
    if (/No activities found/i.test(out)) {
      throw new DeviceError(`No launchable activity in ${packageId}`);
    }
  }
}
