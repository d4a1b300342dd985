import { loadDigestConfig } from '@digestline/pipeline';
import pino from 'pino';
import { createWorkerLogger } from './observability/logger.js';
import { parseRunOnceArgs, runOnce } from './once.js';

async function main(): Promise<void> {
  // stdout carries the summary JSON.
  const logger = createWorkerLogger(process.env, pino.destination(2));
  const args = parseRunOnceArgs(process.argv.slice(2));
  const { config, rules } = await loadDigestConfig();

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn({ event: 'run_cancel_requested' }, 'Cancelling: in-flight items finish, the rest are skipped');
    controller.abort();
  });

  const summary = await runOnce({ config, rules, args, logger, signal: controller.signal });
  console.log(JSON.stringify(summary, null, 2));

  if (summary.counts.failed > 0) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
