export type RunControlState = {
  status: "running" | "paused" | "stopping";
  maxSteps: number;
  currentStep: number;
};

type PauseBarrier = { promise: Promise<void>; resolve: () => void };

const createBarrier = (): PauseBarrier => {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
};

export type RunControlOptions = {
  maxSteps: number;
  startStep?: number;
  abortSignal?: AbortSignal;
};

/**
 * Cooperative control surface shared between the API layer and a running task.
 * The loop consults it once per iteration: pause, stop and a live step budget.
 */
export class RunControl {
  private state: RunControlState;
  private pauseBarrier: PauseBarrier | null = null;
  private externalAbort: AbortSignal | null = null;

  constructor(opts: RunControlOptions) {
    this.state = {
      status: "running",
      maxSteps: opts.maxSteps,
      currentStep: opts.startStep ?? 0,
    };
    if (opts.abortSignal) {
      this.attachAbortSignal(opts.abortSignal);
    }
  }

  attachAbortSignal(signal: AbortSignal) {
    if (this.externalAbort) {
      this.externalAbort.removeEventListener("abort", this.handleAbort);
    }
    this.externalAbort = signal;
    if (signal.aborted) {
      this.handleAbort();
    } else {
      signal.addEventListener("abort", this.handleAbort);
    }
  }

  private handleAbort = () => {
    this.stop();
  };

  snapshot(): RunControlState {
    return { ...this.state };
  }

  getCurrentStep() {
    return this.state.currentStep;
  }

  setCurrentStep(step: number) {
    this.state.currentStep = step;
  }

  getMaxSteps() {
    return this.state.maxSteps;
  }

  updateMaxSteps(maxSteps: number) {
    this.state.maxSteps = maxSteps;
    if (this.state.currentStep >= maxSteps && this.state.status === "paused") {
      // Let a paused loop wake up and notice the budget is spent.
      this.releaseBarrier();
      this.state.status = "running";
    }
  }

  isPaused() {
    return this.state.status === "paused";
  }

  async waitIfPaused() {
    if (this.state.status !== "paused") {
      return;
    }
    if (!this.pauseBarrier) {
      this.pauseBarrier = createBarrier();
    }
    await this.pauseBarrier.promise;
  }

  pause() {
    if (this.state.status === "running") {
      this.state.status = "paused";
    }
  }

  resume() {
    if (this.state.status !== "paused") {
      return;
    }
    this.state.status = "running";
    this.releaseBarrier();
  }

  stop() {
    this.state.status = "stopping";
    this.releaseBarrier();
  }

  shouldStop() {
    return this.state.status === "stopping";
  }

  private releaseBarrier() {
    if (this.pauseBarrier) {
      this.pauseBarrier.resolve();
      this.pauseBarrier = null;
    }
  }
}
