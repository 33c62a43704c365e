/**
 * Frame scheduling
 *
 * The engine asks a scheduler for a callback whenever a frame is needed,
 * in the shape of requestAnimationFrame. Hosts with a display link plug
 * in their own; the default runs on timers.
 */

export type FrameHandle = number;

export interface FrameScheduler {
  request(callback: () => void): FrameHandle;
  cancel(handle: FrameHandle): void;
}

export const DEFAULT_FRAME_INTERVAL_MS = 1000 / 60;

/** Fires callbacks on setTimeout at a fixed interval (60 Hz by default) */
export class TimerScheduler implements FrameScheduler {
  private readonly interval: number;
  private timers = new Map<FrameHandle, ReturnType<typeof setTimeout>>();
  private nextHandle: FrameHandle = 1;

  constructor(interval: number = DEFAULT_FRAME_INTERVAL_MS) {
    this.interval = interval;
  }

  request(callback: () => void): FrameHandle {
    const handle = this.nextHandle++;
    const timer = setTimeout(() => {
      this.timers.delete(handle);
      callback();
    }, this.interval);
    this.timers.set(handle, timer);
    return handle;
  }

  cancel(handle: FrameHandle): void {
    const timer = this.timers.get(handle);
    if (timer === undefined) return;
    clearTimeout(timer);
    this.timers.delete(handle);
  }
}

/**
 * Holds callbacks until step() is called. For headless hosts and tests
 * that drive frames explicitly.
 */
export class ManualScheduler implements FrameScheduler {
  private callbacks = new Map<FrameHandle, () => void>();
  private nextHandle: FrameHandle = 1;

  request(callback: () => void): FrameHandle {
    const handle = this.nextHandle++;
    this.callbacks.set(handle, callback);
    return handle;
  }

  cancel(handle: FrameHandle): void {
    this.callbacks.delete(handle);
  }

  /** Run the callbacks pending right now; returns how many ran */
  step(): number {
    const due = [...this.callbacks.values()];
    this.callbacks.clear();
    for (const callback of due) {
      callback();
    }
    return due.length;
  }

  get pending(): number {
    return this.callbacks.size;
  }
}
