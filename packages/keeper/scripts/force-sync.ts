#!/usr/bin/env tsx
/**
 * Force an immediate sentinel cycle on the keeper service
 * Usage: tsx scripts/force-sync.ts [url]
 *
 * URL priority: CLI arg > KEEPER_URL env > default (localhost:9100)
 */
import 'dotenv/config';

const DEFAULT_URL = 'http://localhost:9100';
const url = process.argv[2] || process.env.KEEPER_URL || DEFAULT_URL;

async function forceSync() {
  console.log(`Forcing sync at: ${url}`);

  try {
    const response = await fetch(`${url}/sync`, {
      method: 'POST',
    });
    const data: unknown = await response.json();

    if (response.ok) {
      console.log('Sync completed successfully');
      console.log(JSON.stringify(data, null, 2));
      process.exit(0);
    } else {
      console.error('Sync failed');
      console.error(JSON.stringify(data, null, 2));
      process.exit(1);
    }
  } catch (error) {
    console.error('Force sync failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

forceSync().catch((error) => {
  console.error(error);
  process.exit(1);
});
