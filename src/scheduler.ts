import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { AppConfig, Secrets } from "./config";
import { runBriefing } from "./digest/orchestrator";
import type { BriefingDeps } from "./digest/orchestrator";

export type BriefingScheduler = {
  readonly stop: () => void;
};

/**
 * Registers a cron task that runs one briefing per tick of `schedule`.
 * A tick never overlaps the previous one; an overdue tick is skipped and
 * logged.
 *
 * @param schedule - Cron expression, usually `config.schedule`
 * @param config - Application configuration passed to every run
 * @param secrets - Credentials resolved once at startup
 * @param deps - Deliverer and optional collector handed to {@link runBriefing}
 * @param logger - Logger for tick events
 * @returns A BriefingScheduler whose stop() halts further ticks
 */
export function createBriefingScheduler(
  schedule: string,
  config: AppConfig,
  secrets: Secrets,
  deps: BriefingDeps,
  logger: Logger,
): BriefingScheduler {
  let running = false;

  const task: ScheduledTask = cron.schedule(schedule, async () => {
    if (running) {
      logger.warn("previous briefing still running, skipping tick");
      return;
    }

    running = true;
    try {
      const outcome = await runBriefing(config, secrets, deps, logger);
      logger.info({ status: outcome.status }, "scheduled briefing finished");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(
        { error: message },
        "scheduled briefing failed unexpectedly",
      );
    } finally {
      running = false;
    }
  });

  return {
    stop: () => {
      task.stop();
    },
  };
}
