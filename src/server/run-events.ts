import type { PilotEvent } from "../core/types.js";
import type { RunControl } from "../core/run-control.js";

export type RunStreamEvent = PilotEvent & { runId: string };
type RunEventHandler = (event: RunStreamEvent) => void;

/**
 * In-process registry of live runs: stream listeners, run controls and the
 * device each run holds.
 */
export class RunRegistry {
  private readonly listeners = new Map<string, Set<RunEventHandler>>();
  private readonly controllers = new Map<string, AbortController>();
  private readonly controls = new Map<string, RunControl>();
  private readonly deviceOwners = new Map<string, string>();

  subscribe(runId: string, handler: RunEventHandler) {
    let set = this.listeners.get(runId);
    if (!set) {
      set = new Set<RunEventHandler>();
      this.listeners.set(runId, set);
    }
    set.add(handler);
    return () => {
      const current = this.listeners.get(runId);
      if (!current) return;
      current.delete(handler);
      if (current.size === 0) {
        this.listeners.delete(runId);
      }
    };
  }

  emit(runId: string, event: PilotEvent) {
    const listeners = this.listeners.get(runId);
    if (listeners && listeners.size > 0) {
      const payload: RunStreamEvent = { ...event, runId };
      for (const handler of [...listeners]) {
        handler(payload);
      }
    }
    if (event.type === "done") {
      this.listeners.delete(runId);
    }
  }

  /** Claims the device for a run; false while another run holds it. */
  claimDevice(deviceKey: string, runId: string) {
    const owner = this.deviceOwners.get(deviceKey);
    if (owner && owner !== runId) return false;
    this.deviceOwners.set(deviceKey, runId);
    return true;
  }

  deviceOwner(deviceKey: string) {
    return this.deviceOwners.get(deviceKey);
  }

  register(runId: string, controller: AbortController, control: RunControl) {
    this.controllers.set(runId, controller);
    this.controls.set(runId, control);
  }

  /** Drops the run's control handles and releases any device it held. */
  release(runId: string) {
    this.controllers.delete(runId);
    this.controls.delete(runId);
    for (const [deviceKey, owner] of this.deviceOwners) {
      if (owner === runId) this.deviceOwners.delete(deviceKey);
    }
  }

  isActive(runId: string) {
    return this.controls.has(runId);
  }

  abort(runId: string): boolean {
    const controller = this.controllers.get(runId);
    const control = this.controls.get(runId);
    if (!controller && !control) {
      return false;
    }
    control?.stop();
    controller?.abort();
    return true;
  }

  pause(runId: string): boolean {
    const control = this.controls.get(runId);
    if (!control) return false;
    control.pause();
    return true;
  }

  resume(runId: string): boolean {
    const control = this.controls.get(runId);
    if (!control) return false;
    control.resume();
    return true;
  }

  setBudget(runId: string, maxSteps: number): boolean {
    const control = this.controls.get(runId);
    if (!control) return false;
    control.updateMaxSteps(maxSteps);
    return true;
  }
}
