import type { Point, RawElementRecord, ScreenInfo } from "../core/types.js";

/**
 * Primitive operations on one device. Every call may reject with a
 * `DeviceConnectionError` when the link is gone or a `DeviceError` when the
 * device refused the operation.
 */
export interface DeviceCapability {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): Promise<boolean>;
  screenInfo(): Promise<ScreenInfo>;
  screenshot(): Promise<Uint8Array>;
  tap(point: Point): Promise<void>;
  swipe(start: Point, end: Point, durationMs: number): Promise<void>;
  inputText(text: string): Promise<void>;
  pressKey(name: string): Promise<void>;
  dumpUIHierarchy(): Promise<RawElementRecord[]>;
  launchApp(packageId: string): Promise<void>;
}
