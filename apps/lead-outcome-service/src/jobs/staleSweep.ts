import { errorMessage } from "../errors";
import { StageTransitionEngine } from "../services";

export interface StaleSweepSchedule {
  /** Resolves once the in-flight run (if any) has finished */
  runNow(): Promise<void>;
  stop(): void;
}

/**
 * Run the NO_RESPONSE sweep on a timer. A tick that fires while the previous
 * run is still going is skipped. The timer does not keep the process alive.
 */
export function scheduleStaleSweep(
  engine: StageTransitionEngine,
  options: { cutoffDays: number; intervalMinutes: number }
): StaleSweepSchedule {
  let inFlight: Promise<void> | null = null;

  const runNow = (): Promise<void> => {
    if (inFlight) {
      console.log("[staleSweep] Previous run still in progress, skipping");
      return inFlight;
    }

    inFlight = engine
      .staleSweep(options.cutoffDays)
      .then((records) => {
        console.log(`[staleSweep] Run finished, ${records.length} lead(s) moved to NO_RESPONSE`);
      })
      .catch((error: unknown) => {
        console.error("[staleSweep] Run failed:", errorMessage(error));
      })
      .finally(() => {
        inFlight = null;
      });

    return inFlight;
  };

  if (options.intervalMinutes <= 0) {
    console.log("[staleSweep] Disabled (interval is 0)");
    return { runNow, stop: () => undefined };
  }

  const timer = setInterval(() => {
    void runNow();
  }, options.intervalMinutes * 60 * 1000);
  timer.unref();

  console.log(
    `[staleSweep] Scheduled every ${options.intervalMinutes} min, cutoff ${options.cutoffDays} days`
  );

  return {
    runNow,
    stop: () => clearInterval(timer),
  };
}
