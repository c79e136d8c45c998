import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig, loadSecrets, validateSecrets } from "./config";
import { createSmtpSender, runBriefing } from "./digest";
import { createBriefingScheduler } from "./scheduler";
import { registerShutdownHandlers } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("daily-briefing starting");

  let config;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    {
      provider: config.llm.provider,
      model: config.llm.model,
      format: config.briefing.format,
    },
    "config loaded",
  );

  const secrets = loadSecrets(process.env, config.llm.provider);
  const deliver = createSmtpSender();

  if (!config.schedule) {
    const outcome = await runBriefing(config, secrets, { deliver }, logger);
    logger.info({ status: outcome.status }, "daily-briefing finished");
    return;
  }

  for (const issue of validateSecrets(secrets)) {
    logger.warn({ issue }, "secret missing, scheduled runs will report it");
  }

  const scheduler = createBriefingScheduler(
    config.schedule,
    config,
    secrets,
    { deliver },
    logger,
  );
  logger.info({ schedule: config.schedule }, "briefing scheduler started");

  registerShutdownHandlers({ schedulers: [scheduler], logger });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
