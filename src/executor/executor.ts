import type { Clock } from "../core/retry-policy.js";
import { systemClock } from "../core/retry-policy.js";
import type {
  ActionOutcome,
  Point,
  ResolvedCommand,
  ScreenInfo,
  SwipeDirection,
} from "../core/types.js";
import type { DeviceCapability } from "../device/types.js";
import { DeviceConnectionError, TimeoutError, errorMessage } from "../utils/errors.js";
import type { PilotLogger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import { withTimeout } from "../utils/timeout.js";

export const DEFAULT_SCREEN: ScreenInfo = { width: 1080, height: 1920, orientation: "portrait" };

/**
 * Finger path for a swipe. Vertical swipes run between 70% and 30% of the
 * height at the horizontal centre, horizontal ones between 80% and 20% of the
 * width at the vertical centre. "up" moves the finger up, revealing content below.
 */
export function swipeVector(direction: SwipeDirection, screen: ScreenInfo = DEFAULT_SCREEN) {
  const { width, height } = screen;
  const cx = Math.round(width / 2);
  const cy = Math.round(height / 2);
  const at = (x: number, y: number): Point => ({ x: Math.round(x), y: Math.round(y) });

  switch (direction) {
    case "up":
      return { start: at(cx, height * 0.7), end: at(cx, height * 0.3) };
    case "down":
      return { start: at(cx, height * 0.3), end: at(cx, height * 0.7) };
    case "left":
      return { start: at(width * 0.8, cy), end: at(width * 0.2, cy) };
    case "right":
      return { start: at(width * 0.2, cy), end: at(width * 0.8, cy) };
  }
}

export type ExecutorOptions = {
  clock?: Clock;
  settleDelayMs?: number;
  timeoutMs?: number;
  logger?: PilotLogger;
};

/**
 * Issues resolved commands against a device and turns every result, including
 * thrown device errors and timeouts, into an {@link ActionOutcome}.
 */
export class ActionExecutor {
  private readonly clock: Clock;
  private readonly settleDelayMs: number;
  private readonly timeoutMs: number;
  private readonly logger: PilotLogger;

  constructor(opts: ExecutorOptions = {}) {
    this.clock = opts.clock ?? systemClock;
    this.settleDelayMs = opts.settleDelayMs ?? 300;
    this.timeoutMs = opts.timeoutMs ?? 30000;
    this.logger = opts.logger ?? silentLogger;
  }

  async execute(
    command: ResolvedCommand,
    device: DeviceCapability,
    screen: ScreenInfo = DEFAULT_SCREEN
  ): Promise<ActionOutcome> {
    if (command.type === "input" && command.text.length === 0) {
      return {
        success: false,
        error: "input action requires text",
        needsRecovery: true,
        errorKind: "execution",
      };
    }

    try {
      const data = await withTimeout(
        this.dispatch(command, device, screen),
        this.timeoutMs,
        `${command.type} action`
      );
      await this.clock.sleep(this.settleDelayMs);
      this.logger.debug("Action executed", { command, data });
      return { success: true, data, needsRecovery: false };
    } catch (error) {
      const message = errorMessage(error);
      if (error instanceof DeviceConnectionError) {
        this.logger.warn("Device connection lost during action", { command, error: message });
        return { success: false, error: message, needsRecovery: false, errorKind: "transport" };
      }
      this.logger.warn("Action failed", {
        command,
        error: message,
        timedOut: error instanceof TimeoutError,
      });
      return { success: false, error: message, needsRecovery: true, errorKind: "execution" };
    }
  }

  private async dispatch(
    command: ResolvedCommand,
    device: DeviceCapability,
    screen: ScreenInfo
  ): Promise<Record<string, unknown>> {
    switch (command.type) {
      case "tap":
        await device.tap(command.point);
        return { x: command.point.x, y: command.point.y };
      case "swipe": {
        const { start, end } = swipeVector(command.direction, screen);
        await device.swipe(start, end, command.durationMs);
        return { direction: command.direction, start, end, durationMs: command.durationMs };
      }
      case "input":
        if (command.focus) {
          await device.tap(command.focus);
          await this.clock.sleep(this.settleDelayMs);
        }
        await device.inputText(command.text);
        return { text: command.text, length: command.text.length };
      case "key":
        await device.pressKey(command.key);
        return { key: command.key };
      case "wait":
        await this.clock.sleep(command.durationMs);
        return { durationMs: command.durationMs };
      case "launch":
        await device.launchApp(command.packageId);
        return { packageId: command.packageId };
    }
  }
}
