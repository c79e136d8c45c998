// pattern: Imperative Shell
import type { Logger } from "pino";
import type { AppConfig, Secrets } from "../config";
import { validateSecrets } from "../config/secrets";
import { summarizeOptionsFrom } from "../llm/client";
import { summarize } from "../llm/summarizer";
import type { SummarizeError } from "../llm/summarizer";
import { aggregate, collectCategoryBuffers } from "../pipeline";
import type { CategoryBuffers } from "../pipeline";
import { formatBriefing, formatDate } from "./renderer";
import type { DeliverError, DeliverFn } from "./sender";

export type BriefingStage =
  | "preflight"
  | "fetching"
  | "aggregating"
  | "summarizing"
  | "formatting"
  | "delivering";

/**
 * How a run ended. `undelivered` still carries the report: it was produced,
 * only the email failed.
 */
export type BriefingOutcome =
  | {
      readonly status: "aborted";
      readonly stage: "preflight" | "summarizing";
      readonly error: SummarizeError;
    }
  | {
      readonly status: "delivered";
      readonly report: string;
      readonly messageId: string;
    }
  | {
      readonly status: "undelivered";
      readonly report: string;
      readonly error: DeliverError;
    }
  | {
      readonly status: "failed";
      readonly stage: BriefingStage;
      readonly message: string;
    };

export type BriefingDeps = {
  readonly deliver: DeliverFn;
  readonly collect?: (
    config: AppConfig,
    logger: Logger,
  ) => Promise<CategoryBuffers>;
  readonly now?: () => Date;
};

export function buildSubject(prefix: string, now: Date): string {
  return `${prefix} ${formatDate(now)} Tech, Finance & Papers Briefing`;
}

function collectFromConfig(
  config: AppConfig,
  logger: Logger,
): Promise<CategoryBuffers> {
  return collectCategoryBuffers(
    config.sources,
    {
      maxItemsPerSource: config.fetch.maxItemsPerSource,
      summaryMaxLength: config.fetch.summaryMaxLength,
      maxConcurrency: config.fetch.maxConcurrency,
      timeoutMs: config.fetch.timeoutMs,
      papers: config.papers,
    },
    logger,
  );
}

/**
 * Runs one briefing: fetch, aggregate, summarize, format, deliver.
 *
 * Stages only move forward. A missing backend credential stops the run in
 * preflight before anything is fetched; a summarizer failure stops it before
 * formatting, so no email goes out. Missing mail settings do not stop the run:
 * the report is produced and delivery reports `MissingConfig`.
 *
 * @param config - Validated application configuration
 * @param secrets - Credentials resolved from the environment
 * @param deps - Deliverer plus optional collector and clock, injected for tests
 * @param logger - Logger for stage transitions and surfaced errors
 * @returns The outcome; an unexpected error inside a stage becomes `failed`
 *          rather than a rejection
 */
export async function runBriefing(
  config: AppConfig,
  secrets: Secrets,
  deps: BriefingDeps,
  logger: Logger,
): Promise<BriefingOutcome> {
  const tracker: { stage: BriefingStage } = { stage: "preflight" };
  try {
    return await runStages(config, secrets, deps, logger, tracker);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(
      { stage: tracker.stage, error: message },
      "briefing run failed unexpectedly",
    );
    return { status: "failed", stage: tracker.stage, message };
  }
}

async function runStages(
  config: AppConfig,
  secrets: Secrets,
  deps: BriefingDeps,
  logger: Logger,
  tracker: { stage: BriefingStage },
): Promise<BriefingOutcome> {
  const collect = deps.collect ?? collectFromConfig;
  const now = deps.now ?? (() => new Date());

  for (const issue of validateSecrets(secrets)) {
    if (issue.kind === "MissingCredential") {
      const message = `${issue.variable} is not set`;
      logger.error({ stage: "preflight" }, message);
      return {
        status: "aborted",
        stage: "preflight",
        error: { kind: "MissingCredential", message },
      };
    }
    logger.warn(
      { stage: "preflight", missing: issue.fields },
      "mail configuration incomplete, the briefing will not be delivered",
    );
  }

  tracker.stage = "fetching";
  logger.info({ stage: "fetching" }, "briefing run starting");
  const buffers = await collect(config, logger);

  tracker.stage = "aggregating";
  logger.info({ stage: "aggregating" }, "truncating category buffers");
  const request = aggregate(buffers, config.briefing.maxCategoryChars);

  tracker.stage = "summarizing";
  logger.info({ stage: "summarizing" }, "summarizing sources");
  const summary = await summarize(
    request,
    summarizeOptionsFrom(config, secrets),
    logger,
  );
  if (!summary.success) {
    logger.error(
      { stage: "summarizing", error: summary.error },
      "summarization failed, no email will be sent",
    );
    return { status: "aborted", stage: "summarizing", error: summary.error };
  }

  tracker.stage = "formatting";
  logger.info(
    { stage: "formatting", format: config.briefing.format },
    "formatting report",
  );
  const generatedAt = now();
  const body = formatBriefing(
    summary.report,
    config.briefing.format,
    generatedAt,
  );
  const subject = buildSubject(config.briefing.subjectPrefix, generatedAt);

  tracker.stage = "delivering";
  logger.info({ stage: "delivering" }, "delivering briefing");
  const result = await deps.deliver(subject, body, secrets.mail, logger);

  if (!result.success) {
    logger.error(
      { stage: "delivering", error: result.error },
      "briefing produced but not delivered",
    );
    return {
      status: "undelivered",
      report: summary.report,
      error: result.error,
    };
  }

  logger.info({ messageId: result.messageId }, "briefing run complete");
  return {
    status: "delivered",
    report: summary.report,
    messageId: result.messageId,
  };
}
