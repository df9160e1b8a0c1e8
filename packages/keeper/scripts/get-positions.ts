#!/usr/bin/env tsx
/**
 * List synced positions from the keeper service
 * Usage: tsx scripts/get-positions.ts [url] [--liquidatable]
 *
 * URL priority: CLI arg > KEEPER_URL env > default (localhost:9100)
 */
import 'dotenv/config';

const DEFAULT_URL = 'http://localhost:9100';
const args = process.argv.slice(2);
const liquidatableOnly = args.includes('--liquidatable');
const url = args.find((arg) => !arg.startsWith('--')) || process.env.KEEPER_URL || DEFAULT_URL;

async function getPositions() {
  const query = liquidatableOnly ? '?liquidatable=true' : '';
  console.log(`Fetching positions from: ${url}`);

  try {
    const response = await fetch(`${url}/positions${query}`);
    const data: unknown = await response.json();

    console.log('\n=== Positions ===');
    console.log(JSON.stringify(data, null, 2));

    const historyResponse = await fetch(`${url}/liquidations?limit=10`);
    const history: unknown = await historyResponse.json();

    console.log('\n=== Recent Liquidations ===');
    console.log(JSON.stringify(history, null, 2));
  } catch (error) {
    console.error('Failed to fetch positions:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

getPositions().catch((error) => {
  console.error(error);
  process.exit(1);
});
