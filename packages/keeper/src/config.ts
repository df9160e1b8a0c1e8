import type { LevelWithSilent } from 'pino';
import { DEFAULT_COLLATERAL_ASSET } from '@lendbook/ledger';
import {
  DEFAULT_CUSTODY_LIQUIDITY,
  DEFAULT_INITIAL_RATE,
  DEFAULT_KEEPER_ADDRESS,
  DEFAULT_KEEPER_BUDGET,
  DEFAULT_KEEPER_PORT,
  DEFAULT_SYNC_INTERVAL,
  DEFAULT_TICK_INTERVAL,
  DEFAULT_VAULT_LIQUIDITY,
  isValidParticipant,
  parseAmount,
  parseRate,
} from './utils';

const LOG_LEVELS: LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface KeeperConfig {
  apiPort: number;
  logLevel: LevelWithSilent;
  tickInterval: number; // milliseconds
  syncInterval: number; // milliseconds
  collateralAssetId: string;
  initialRate: bigint; // scaled by RATE_BASE
  keeperAddress: string;
  keeperBudget: bigint;
  vaultLiquidity: bigint;
  custodyLiquidity: bigint; // collateral reserve covering deposit interest on withdrawal
  autoLiquidate: boolean;
}

type Env = Record<string, string | undefined>;

function readInterval(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer number of milliseconds, got "${raw}"`);
  }
  return value;
}

function readPort(env: Env): number {
  const raw = env.KEEPER_PORT || env.PORT;
  if (!raw) return DEFAULT_KEEPER_PORT;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`KEEPER_PORT must be between 1 and 65535, got "${raw}"`);
  }
  return port;
}

function readUnits(env: Env, name: string, fallback: bigint): bigint {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseAmount(raw);
  if (value === undefined) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function readLogLevel(env: Env): LevelWithSilent {
  const raw = (env.LOG_LEVEL || 'info').toLowerCase();
  const level = LOG_LEVELS.find((known) => known === raw);
  if (!level) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return level;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new Error(`${name} must be true or false, got "${raw}"`);
  }
}

/**
 * Build the keeper configuration from environment variables
 * @throws on any malformed value
 */
export function loadConfig(env: Env = process.env): KeeperConfig {
  const rawRate = env.INITIAL_RATE || DEFAULT_INITIAL_RATE;
  const initialRate = parseRate(rawRate);
  if (initialRate === undefined) {
    throw new Error(`INITIAL_RATE must be a positive decimal, got "${rawRate}"`);
  }

  const keeperAddress = env.KEEPER_ADDRESS || DEFAULT_KEEPER_ADDRESS;
  if (!isValidParticipant(keeperAddress)) {
    throw new Error(`KEEPER_ADDRESS must be 1-64 characters without whitespace, got "${keeperAddress}"`);
  }

  return {
    apiPort: readPort(env),
    logLevel: readLogLevel(env),
    tickInterval: readInterval(env, 'TICK_INTERVAL', DEFAULT_TICK_INTERVAL),
    syncInterval: readInterval(env, 'SYNC_INTERVAL', DEFAULT_SYNC_INTERVAL),
    collateralAssetId: env.COLLATERAL_ASSET || DEFAULT_COLLATERAL_ASSET,
    initialRate,
    keeperAddress,
    keeperBudget: readUnits(env, 'KEEPER_BUDGET', DEFAULT_KEEPER_BUDGET),
    vaultLiquidity: readUnits(env, 'VAULT_LIQUIDITY', DEFAULT_VAULT_LIQUIDITY),
    custodyLiquidity: readUnits(env, 'CUSTODY_LIQUIDITY', DEFAULT_CUSTODY_LIQUIDITY),
    autoLiquidate: readBoolean(env, 'AUTO_LIQUIDATE', true),
  };
}

/**
 * Config with bigints rendered for logging
 */
export function describeConfig(config: KeeperConfig) {
  return {
    ...config,
    initialRate: config.initialRate.toString(),
    keeperBudget: config.keeperBudget.toString(),
    vaultLiquidity: config.vaultLiquidity.toString(),
    custodyLiquidity: config.custodyLiquidity.toString(),
  };
}
