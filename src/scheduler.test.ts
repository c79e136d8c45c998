import { describe, it, expect, beforeEach, vi } from "vitest";
import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import { createMockLogger, createTestConfig, createTestSecrets } from "./test-utils/config";
import type { BriefingDeps, BriefingOutcome } from "./digest/orchestrator";

vi.mock("node-cron");
vi.mock("./digest/orchestrator");

import { runBriefing } from "./digest/orchestrator";
import { createBriefingScheduler } from "./scheduler";

const delivered: BriefingOutcome = { status: "delivered", report: "report", messageId: "msg-1" };

describe("createBriefingScheduler", () => {
  let capturedCallback: ((now: Date | "manual" | "init") => unknown) | null;
  let taskStop: ReturnType<typeof vi.fn>;
  const config = createTestConfig();
  const secrets = createTestSecrets();
  const deps: BriefingDeps = { deliver: vi.fn() };

  beforeEach(() => {
    vi.clearAllMocks();
    capturedCallback = null;
    taskStop = vi.fn();

    vi.mocked(cron.schedule).mockImplementation((_expression, callback) => {
      if (typeof callback === "function") capturedCallback = callback;
      return { stop: taskStop } as unknown as ScheduledTask;
    });
  });

  it("should register a cron task with the given expression", () => {
    createBriefingScheduler("0 8 * * *", config, secrets, deps, createMockLogger());

    expect(cron.schedule).toHaveBeenCalledWith("0 8 * * *", expect.any(Function));
  });

  it("should run one briefing per tick with the startup config and secrets", async () => {
    vi.mocked(runBriefing).mockResolvedValue(delivered);
    const logger = createMockLogger();
    createBriefingScheduler("0 8 * * *", config, secrets, deps, logger);

    await capturedCallback?.(new Date());

    expect(runBriefing).toHaveBeenCalledOnce();
    expect(runBriefing).toHaveBeenCalledWith(config, secrets, deps, logger);
    expect(logger.info).toHaveBeenCalledWith(
      { status: "delivered" },
      "scheduled briefing finished",
    );
  });

  it("should skip a tick while the previous briefing is still running", async () => {
    let finish: (outcome: BriefingOutcome) => void = () => undefined;
    vi.mocked(runBriefing).mockImplementationOnce(
      () =>
        new Promise<BriefingOutcome>((resolve) => {
          finish = resolve;
        }),
    );
    const logger = createMockLogger();
    createBriefingScheduler("* * * * *", config, secrets, deps, logger);

    const first = capturedCallback?.(new Date());
    await capturedCallback?.(new Date());
    finish(delivered);
    await first;

    expect(runBriefing).toHaveBeenCalledOnce();
    expect(logger.warn).toHaveBeenCalledWith("previous briefing still running, skipping tick");
  });

  it("should run again once the previous tick finished", async () => {
    vi.mocked(runBriefing).mockResolvedValue(delivered);
    createBriefingScheduler("* * * * *", config, secrets, deps, createMockLogger());

    await capturedCallback?.(new Date());
    await capturedCallback?.(new Date());

    expect(runBriefing).toHaveBeenCalledTimes(2);
  });

  it("should log a rejected run instead of throwing", async () => {
    vi.mocked(runBriefing).mockRejectedValue(new Error("boom"));
    const logger = createMockLogger();
    createBriefingScheduler("0 8 * * *", config, secrets, deps, logger);

    await expect(capturedCallback?.(new Date())).resolves.toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith(
      { error: "boom" },
      "scheduled briefing failed unexpectedly",
    );
  });

  it("should stop the cron task", () => {
    const scheduler = createBriefingScheduler("0 8 * * *", config, secrets, deps, createMockLogger());

    scheduler.stop();

    expect(taskStop).toHaveBeenCalledOnce();
  });
});
