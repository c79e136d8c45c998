// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * Anything holding a timer or task that must be stopped before exit.
 */
export type Stoppable = {
  readonly stop: () => void;
};

export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<Stoppable>;
  readonly logger: Logger;
  readonly exit?: (code: number) => void;
};

/**
 * Installs SIGTERM and SIGINT handlers that stop every scheduler once, then
 * exit with code 0. A second signal during shutdown is ignored. A scheduler
 * that throws while stopping is logged and the rest are still stopped.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  let shuttingDown = false;
  const exit = deps.exit ?? ((code: number) => process.exit(code));

  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const scheduler of deps.schedulers) {
      try {
        scheduler.stop();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "error stopping scheduler");
      }
    }

    deps.logger.info("shutdown complete");
    exit(0);
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}
