import { isUpdateError, toErrorMessage } from "./errors.js";
import type { UpdateCheckResult } from "./types.js";

type SchedulerTimerHandle = ReturnType<typeof setInterval>;
type SetIntervalFn = (handler: () => void, timeoutMs: number) => SchedulerTimerHandle;
type ClearIntervalFn = (handle: SchedulerTimerHandle) => void;

export interface UpdateCheckSchedulerDeps {
  intervalMs: number;
  check: () => Promise<UpdateCheckResult>;
  isBusy: () => boolean;
  setIntervalFn?: SetIntervalFn;
  clearIntervalFn?: ClearIntervalFn;
}

export interface UpdateCheckSchedulerHandle {
  /** Resolves when the tick's check has settled. */
  tick: () => Promise<void>;
  dispose: () => void;
}

export function startUpdateCheckScheduler(deps: UpdateCheckSchedulerDeps): UpdateCheckSchedulerHandle {
  const setIntervalFn = deps.setIntervalFn ?? ((handler, timeoutMs) => setInterval(handler, timeoutMs));
  const clearIntervalFn = deps.clearIntervalFn ?? ((handle) => clearInterval(handle));
  let checking = false;

  const tick = async (): Promise<void> => {
    if (checking || deps.isBusy()) {
      return;
    }

    checking = true;
    try {
      const result = await deps.check();
      if (result.updateAvailable && result.latest) {
        console.info(`[scheduler] Update available: ${result.currentVersion} -> ${result.latest.version}.`);
      }
    } catch (error) {
      if (isUpdateError(error) && error.code === "BUSY") {
        console.info(`[scheduler] Skipped a periodic check: ${error.message}`);
        return;
      }
      console.warn(`[scheduler] Periodic update check failed: ${toErrorMessage(error)}`);
    } finally {
      checking = false;
    }
  };

  let handle: SchedulerTimerHandle | null = null;
  if (deps.intervalMs > 0) {
    handle = setIntervalFn(() => {
      void tick();
    }, deps.intervalMs);
    if (typeof handle.unref === "function") {
      handle.unref();
    }
  }

  return {
    tick,
    dispose: () => {
      if (!handle) {
        return;
      }
      clearIntervalFn(handle);
      handle = null;
    }
  };
}
