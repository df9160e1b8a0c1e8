#!/usr/bin/env tsx
/**
 * Report keeper status: ledger tick, sentinel loop and liquidation counts
 * Usage: tsx scripts/health-check.ts [url]
 *
 * Exits 1 when the service is unreachable or its sentinel loop is not running.
 * URL priority: CLI arg > KEEPER_URL env > default (localhost:9100)
 */
import 'dotenv/config';

const DEFAULT_URL = 'http://localhost:9100';
const url = process.argv[2] || process.env.KEEPER_URL || DEFAULT_URL;

interface KeeperHealth {
  status: string;
  tick: string;
  trackedPositions: number;
  liquidatablePositions: number;
  successfulLiquidations: number;
  sentinel: {
    isRunning: boolean;
    cycles: number;
    autoLiquidate: boolean;
    budgetRemaining: string;
  };
}

function isKeeperHealth(data: unknown): data is KeeperHealth {
  if (typeof data !== 'object' || data === null) return false;
  if (!('status' in data) || !('tick' in data) || !('sentinel' in data)) return false;
  const { sentinel } = data;
  return typeof sentinel === 'object' && sentinel !== null && 'isRunning' in sentinel;
}

async function checkKeeper() {
  const response = await fetch(`${url}/health`);
  const data: unknown = await response.json();

  if (!response.ok || !isKeeperHealth(data)) {
    console.error(`Unexpected /health response (HTTP ${response.status})`);
    console.error(JSON.stringify(data, null, 2));
    process.exit(1);
  }

  const { sentinel } = data;
  console.log(`keeper @ ${url}`);
  console.log(`  tick                 ${data.tick}`);
  console.log(`  positions            ${data.trackedPositions} tracked, ${data.liquidatablePositions} liquidatable`);
  console.log(`  liquidations         ${data.successfulLiquidations} executed`);
  console.log(`  sentinel             ${sentinel.isRunning ? 'running' : 'stopped'} after ${sentinel.cycles} cycles`);
  console.log(`  auto-liquidate       ${sentinel.autoLiquidate ? 'on' : 'off'}`);
  console.log(`  budget remaining     ${sentinel.budgetRemaining}`);

  process.exit(sentinel.isRunning ? 0 : 1);
}

checkKeeper().catch((error) => {
  console.error(`Keeper unreachable at ${url}:`, error instanceof Error ? error.message : error);
  process.exit(1);
});
