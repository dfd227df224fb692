/**
 * Run Basecamp Ingestion
 *
 * Validates the Basecamp configuration from the environment, then feeds every
 * project's todos into the index queue once.
 *
 * Usage:
 *   npm run ingest                               # Validate config, ingest into the Bull queue
 *   npm run ingest -- --dry-run                  # Ingest into memory, print a summary only
 *   npm run ingest -- --skip-validation          # Skip the probe request
 *   npm run ingest -- --concurrency 8            # Override INGESTION_CONCURRENCY
 *
 * Exits with 1 when the configuration is invalid or projects cannot be listed.
 * Isolated project failures are reported but do not change the exit code.
 */

import { randomUUID } from 'crypto';
import { validateEnv } from '../config/env.js';
import { dataSourceRegistry } from '../connectors/index.js';
import { parseBasecampConfig } from '../connectors/basecamp/BasecampConfig.js';
import { BullIndexQueue, InMemoryIndexQueue } from '../services/infrastructure/IndexQueue.js';
import { createChildLogger, logger, runContext } from '../utils/logger.js';

interface ScriptOptions {
  dryRun?: boolean;
  skipValidation?: boolean;
  concurrency?: number;
}

/**
 * Parse command line arguments
 */
function parseArgs(): ScriptOptions {
  const args = process.argv.slice(2);
  const options: ScriptOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--dry-run') {
      options.dryRun = true;
    } else if (arg === '--skip-validation') {
      options.skipValidation = true;
    } else if (arg === '--concurrency' && i + 1 < args.length) {
      options.concurrency = parseInt(args[++i], 10);
    }
  }

  return options;
}

async function main() {
  const options = parseArgs();
  const env = validateEnv();
  const definition = dataSourceRegistry.basecamp;
  const runLogger = createChildLogger({ dataSourceId: env.BASECAMP_DATA_SOURCE_ID });

  const rawConfig = {
    url: env.BASECAMP_URL,
    username: env.BASECAMP_USERNAME,
    password: env.BASECAMP_PASSWORD,
  };
  const clientOptions = {
    userAgentApp: env.BASECAMP_USER_AGENT_APP,
    timeoutMs: env.HTTP_TIMEOUT_MS,
    logger: runLogger,
  };

  const config = options.skipValidation
    ? parseBasecampConfig(rawConfig)
    : await definition.validateConfig(rawConfig, clientOptions);
  runLogger.info({ url: config.url, username: config.username }, 'Basecamp configuration accepted');

  const indexQueue = options.dryRun
    ? new InMemoryIndexQueue()
    : BullIndexQueue.create(
        {
          queueName: env.INDEX_QUEUE_NAME,
          redis: { host: env.REDIS_HOST, port: env.REDIS_PORT, password: env.REDIS_PASSWORD },
        },
        runLogger
      );

  try {
    const dataSource = definition.create(env.BASECAMP_DATA_SOURCE_ID, config, {
      indexQueue,
      logger: runLogger,
      concurrency: options.concurrency && options.concurrency > 0 ? options.concurrency : env.INGESTION_CONCURRENCY,
      unitTimeoutMs: env.INGESTION_UNIT_TIMEOUT_MS,
      clientOptions,
    });

    const summary = await dataSource.feedNewDocuments();

    console.log(`\nProjects:        ${summary.projectCount}`);
    console.log(`Documents:       ${summary.enqueuedCount}${options.dryRun ? ' (dry run, not indexed)' : ''}`);
    console.log(`Skipped records: ${summary.skippedRecords.length}`);
    console.log(`Failed projects: ${summary.failedUnits.length}`);
    summary.failedUnits.forEach((unit) => {
      console.log(`   - ${unit.projectName} (${unit.projectId}): ${unit.code} ${unit.message}`);
    });
  } finally {
    if (indexQueue instanceof BullIndexQueue) {
      await indexQueue.close();
    }
  }
}

// Run the script
runContext
  .run({ runId: randomUUID() }, main)
  .catch((error) => {
    logger.error({ error }, 'Basecamp ingestion script failed');
    console.error('\nError:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
