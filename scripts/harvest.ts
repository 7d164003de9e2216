import { loadEnvConfig } from "@next/env";

async function main() {
  loadEnvConfig(process.cwd());

  const [
    dbModule,
    envModule,
    loggingModule,
    poolModule,
    clientModule,
    retryModule,
    loaderModule,
    driverModule,
    transformModule,
    workItemsModule,
    reportModule,
    failureLogModule,
    cliArgsModule,
  ] = await Promise.all([
    import("@/lib/db"),
    import("@/lib/env"),
    import("@/lib/logging"),
    import("@/lib/harvest/credential-pool"),
    import("@/lib/github/rate-limited-client"),
    import("@/lib/harvest/retry-policy"),
    import("@/lib/harvest/batch-loader"),
    import("@/lib/harvest/extraction-driver"),
    import("@/lib/harvest/transform"),
    import("@/lib/harvest/work-items"),
    import("@/lib/harvest/run-report"),
    import("@/lib/harvest/failure-log"),
    import("@/lib/harvest/cli-args"),
  ]);
  const { closePool, countProjects, PostgresProjectStore } = dbModule;
  const { env } = envModule;
  const { createConsoleLogger } = loggingModule;

  if (!env.GITHUB_TOKENS.length) {
    throw new Error(
      "No GitHub tokens configured. Set GITHUB_TOKENS (comma separated) in your environment.",
    );
  }

  const options = cliArgsModule.parseHarvestArgs(process.argv.slice(2));
  const inputFile = options.input ?? env.HARVEST_INPUT_FILE;
  const failureLogFile = options.failureLog ?? env.FAILURE_LOG_FILE;
  const logger = createConsoleLogger("harvest");
  const warn = createConsoleLogger("harvest", "warn");

  const { items, warnings } = await workItemsModule.readWorkList(inputFile);
  for (const warning of warnings) {
    warn(warning);
  }
  logger(`Loaded ${items.length} repositories from ${inputFile}.`);

  const pool = new poolModule.CredentialPool(env.GITHUB_TOKENS, { logger });
  const fetcher = new clientModule.RateLimitedClient({
    pool,
    endpoint: env.GITHUB_GRAPHQL_URL,
    timeoutMs: env.HARVEST_REQUEST_TIMEOUT_MS,
    defaultRateLimitDelayMs: env.HARVEST_RATE_LIMIT_DELAY_MS,
  });
  const retryPolicy = new retryModule.RetryPolicy({
    pool,
    fetcher,
    maxAttempts: env.HARVEST_MAX_ATTEMPTS,
    baseDelayMs: env.HARVEST_BASE_DELAY_MS,
    maxBlockedWaitMs: env.HARVEST_MAX_BLOCKED_WAIT_MS,
    logger,
  });
  const loader = new loaderModule.BatchLoader(new PostgresProjectStore(), {
    naturalKey: (record) => record.id,
    batchSize: env.HARVEST_BATCH_SIZE,
    maxBatchAgeMs: env.HARVEST_BATCH_MAX_AGE_MS,
    maxFlushAttempts: env.HARVEST_FLUSH_ATTEMPTS,
    logger,
  });
  const driver = new driverModule.ExtractionDriver({
    pool,
    retryPolicy,
    loader,
    transform: transformModule.transformRepository,
    concurrency: options.concurrency ?? env.HARVEST_CONCURRENCY,
    perCredential: env.HARVEST_CONCURRENCY_PER_CREDENTIAL,
    logger,
  });

  await loader.ensureSchema();

  const controller = new AbortController();
  const onSignal = () => {
    if (controller.signal.aborted) {
      return;
    }
    warn("Interrupt received; finishing in-flight work before exiting.");
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    const report = await driver.run(items, { signal: controller.signal });
    console.info(reportModule.summarizeRunReport(report));

    const written = await failureLogModule.appendFailureLog(
      failureLogFile,
      report,
    );
    if (written > 0) {
      logger(`Wrote ${written} failure(s) to ${failureLogFile}.`);
    }
    if (report.counts.loaded > 0) {
      logger(`projects now holds ${await countProjects()} row(s).`);
    }

    if (report.status === "aborted") {
      process.exitCode = 1;
    }
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await closePool();
  }
}

main().catch((error) => {
  console.error("[harvest] failed", error);
  import("@/lib/db")
    .then(({ closePool }) =>
      closePool().catch((closeError) => {
        console.error("[harvest] error while closing the database pool", closeError);
      }),
    )
    .finally(() => {
      process.exit(1);
    });
});
