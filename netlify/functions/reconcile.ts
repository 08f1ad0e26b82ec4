/**
 * Scheduled reconciliation.
 * Recomputes cached counters and balances from their source rows and issues
 * any reward that was missed.
 */

import type { Config } from '@netlify/functions';
import { getProductionContainer } from '../../src/container.production.js';

export default async () => {
  const container = getProductionContainer();
  // The service logs its own summary.
  await container.reconciliationService.run();
  await container.logProvider.flush();
};

export const config: Config = {
  schedule: '@daily',
};
