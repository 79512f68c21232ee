/**
 * Lookup CLI Script
 * Layer: Entry Point (CLI, not HTTP)
 *
 *   npm run lookup -- --name "HOMECOMERS RCC INC" [--jurisdiction CA]
 *
 * Runs the same controller lookup the POST /api/search endpoint runs and
 * prints the result as JSON on stdout. Log lines share stdout; run with
 * LOG_LEVEL=silent to pipe the result into jq.
 */
import type { ControllerLookupService } from '@application/services/ControllerLookupService';
import { container } from '@core/container';
import { logger } from '@core/logger';
import { TOKENS } from '@core/types';

const args = process.argv.slice(2);

function getArg(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx !== -1 ? args[idx + 1] : undefined;
}

async function main(): Promise<void> {
  // eslint-disable-next-line no-console
  const log = console.log;

  const companyName = getArg('--name')?.trim();
  const jurisdictionHint = getArg('--jurisdiction');

  if (!companyName) {
    log('Usage: npm run lookup -- --name "<company name>" [--jurisdiction <state or code>]');
    process.exitCode = 1;
    return;
  }

  const service = container.resolve<ControllerLookupService>(TOKENS.ControllerLookupService);

  logger.info({ companyName, jurisdictionHint }, 'Looking up company controllers');
  const result = await service.findControllers(companyName, jurisdictionHint);

  log(JSON.stringify(result, null, 2));
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Lookup failed');
  process.exitCode = 1;
});
