#!/usr/bin/env node
import { getConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { createMonitor } from '../services/monitor.js';
import { MemoryResultStore } from '../services/resultStore.js';
import { toCountryResult } from '../services/queries.js';

async function main() {
  const config = getConfig();
  const country = process.argv[2] ?? config.countries[0] ?? 'Ukraine';

  // live collaborators, nothing written to the data directory
  const store = new MemoryResultStore();
  const { orchestrator } = createMonitor(config, { store });
  console.log('[SMOKE] Running analysis for:', country);

  const run = await orchestrator.run(country);
  console.log('[SMOKE] Status:', run.status);
  console.log('[SMOKE] Totals:', run.totals);
  console.log('[SMOKE] Issues:', run.issues);

  const latest = await store.latest(country);
  if (latest) {
    const result = toCountryResult(latest);
    console.log('[SMOKE] Weekly events:', result.weeklyEvents, 'fatalities:', result.weeklyFatalities);
    console.log('[SMOKE] Alerts:', result.alerts);
    console.log('[SMOKE] Mean sentiment:', result.sentiment?.meanScore ?? 'n/a');
  }
  process.exit(run.status === 'completed' ? 0 : 1);
}

main().catch((e: unknown) => {
  console.error('[SMOKE] Uncaught error:', errorMessage(e));
  process.exit(1);
});
