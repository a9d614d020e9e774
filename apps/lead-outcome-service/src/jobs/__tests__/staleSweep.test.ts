import { createInMemoryStores } from "../../db/client";
import { Lead } from "../../types/outcomes";
import { StageTransitionEngine } from "../../services/stageTransitions";
import { scheduleStaleSweep } from "../staleSweep";

describe("scheduleStaleSweep", () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  function engineWith(findStaleInStage: () => Promise<Lead[]>) {
    const stores = createInMemoryStores();
    const leads = { ...stores.leads, findStaleInStage: jest.fn(findStaleInStage) };
    const engine = new StageTransitionEngine({ ...stores, leads });
    return { engine, findStaleInStage: leads.findStaleInStage };
  }

  it("should not start a second run while one is in flight", async () => {
    let release: (leads: Lead[]) => void = () => undefined;
    const { engine, findStaleInStage } = engineWith(async () => []);
    findStaleInStage.mockImplementationOnce(() => new Promise<Lead[]>((resolve) => (release = resolve)));
    const schedule = scheduleStaleSweep(engine, { cutoffDays: 14, intervalMinutes: 0 });

    const first = schedule.runNow();
    const second = schedule.runNow();
    expect(second).toBe(first);
    expect(findStaleInStage).toHaveBeenCalledTimes(1);

    release([]);
    await first;

    await schedule.runNow();
    expect(findStaleInStage).toHaveBeenCalledTimes(2);
  });

  it("should log a failed run and resolve", async () => {
    const { engine } = engineWith(async () => {
      throw new Error("query failed");
    });
    const schedule = scheduleStaleSweep(engine, { cutoffDays: 14, intervalMinutes: 0 });

    await expect(schedule.runNow()).resolves.toBeUndefined();
    expect(errorSpy).toHaveBeenCalledWith("[staleSweep] Run failed:", "query failed");
  });

  it("should run on the interval until stopped", async () => {
    jest.useFakeTimers();
    const { engine, findStaleInStage } = engineWith(async () => []);
    const schedule = scheduleStaleSweep(engine, { cutoffDays: 14, intervalMinutes: 1 });

    jest.advanceTimersByTime(60 * 1000);
    expect(findStaleInStage).toHaveBeenCalledTimes(1);

    schedule.stop();
    jest.advanceTimersByTime(5 * 60 * 1000);
    expect(findStaleInStage).toHaveBeenCalledTimes(1);

    jest.useRealTimers();
  });
});
