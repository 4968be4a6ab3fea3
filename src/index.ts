import { logger } from './observability/logger.js';
import { loadEnv } from './config/env.js';
import { loadSearchConfig } from './config/search.js';
import { buildRunConfig } from './config/run-config.js';
import { DiscordWebhookNotifier } from './discord/webhook.js';
import { isWithinWindow } from './ingestion/time-gate.js';
import { runOnce } from './ingestion/orchestrator.js';

const log = logger.child({ module: 'main' });

async function main(): Promise<void> {
  const env = loadEnv();
  const config = buildRunConfig(env, loadSearchConfig(env.SEARCH_CONFIG_PATH));

  if (!isWithinWindow(new Date(), config.timeGate)) {
    log.info(
      { timezone: config.timeGate.timezone, hour: config.timeGate.hour },
      'Skipping run (outside local time window)',
    );
    return;
  }

  log.info({ query: config.queryDescription }, 'Starting USAJOBS watch run');
  const outcome = await runOnce(config, { notifier: new DiscordWebhookNotifier(config.webhookUrl) });

  // Business failures were already announced; the scheduler always sees a clean exit
  log.info({ outcome }, 'Run complete');
}

main().catch((err) => {
  log.fatal({ err }, 'Fatal startup error');
  process.exit(1);
});
