#!/usr/bin/env tsx
/**
 * Set the collateral rate (base units per collateral unit) on the keeper's price feed
 * Usage: tsx scripts/set-rate.ts <rate> [url]
 * Example: tsx scripts/set-rate.ts 0.9
 *
 * URL priority: CLI arg > KEEPER_URL env > default (localhost:9100)
 */
import 'dotenv/config';

const DEFAULT_URL = 'http://localhost:9100';

// Sent as the typed string so the service parses the exact decimal
const rate = process.argv[2]?.trim() ?? '';
const url = process.argv[3] || process.env.KEEPER_URL || DEFAULT_URL;

if (!/^\d+(\.\d+)?$/.test(rate) || Number(rate) <= 0) {
  console.error('Usage: tsx scripts/set-rate.ts <rate> [url]');
  console.error('Example: tsx scripts/set-rate.ts 0.9');
  console.error('');
  console.error('URL priority: CLI arg > KEEPER_URL env > default (localhost:9100)');
  process.exit(1);
}

async function setRate() {
  console.log(`Setting collateral rate to ${rate} at: ${url}`);

  try {
    const response = await fetch(`${url}/rate`, {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ rate }),
    });

    const data: unknown = await response.json();

    if (response.ok) {
      console.log(`Collateral rate set to ${rate}`);
      console.log(JSON.stringify(data, null, 2));
      process.exit(0);
    } else {
      console.error('Failed to set rate');
      console.error(JSON.stringify(data, null, 2));
      process.exit(1);
    }
  } catch (error) {
    console.error('Request failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

setRate().catch((error) => {
  console.error(error);
  process.exit(1);
});
