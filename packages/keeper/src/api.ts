import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import type { Logger } from 'pino';
import { formatRatio, isLedgerError, math, type CallContext } from '@lendbook/ledger';
import type { KeeperEnvironment } from './environment';
import type { PositionStorage } from './storage';
import type { KeeperSentinel } from './sentinel';
import {
  HTTP_STATUS,
  LEDGER_ERROR_STATUS,
  createError,
  fromLedgerError,
  isValidParticipant,
  parseAmount,
  parseRate,
  serializeLiquidation,
  serializeLiquidationRecord,
  serializePosition,
  serializeSnapshot,
} from './utils';

export interface KeeperAPIConfig {
  collateralAssetId: string;
}

interface ParsedCall {
  ctx: CallContext;
  kind?: string;
  amount: bigint;
  target?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readBody(c: Context): Promise<Record<string, unknown> | undefined> {
  try {
    const body: unknown = await c.req.json();
    return isRecord(body) ? body : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Validate a ledger call body
 * @returns the parsed call, or an error message
 */
function parseCall(
  body: Record<string, unknown>,
  fields: { kind?: boolean; amount?: boolean; target?: boolean }
): ParsedCall | string {
  const { caller, kind, amount, value, target } = body;

  if (!isValidParticipant(caller)) {
    return 'Invalid caller. Must be 1-64 characters without whitespace';
  }
  if (fields.kind && typeof kind !== 'string') {
    return 'Missing asset kind';
  }
  if (fields.target && !isValidParticipant(target)) {
    return 'Invalid target. Must be 1-64 characters without whitespace';
  }

  const parsedAmount = fields.amount ? parseAmount(amount) : 0n;
  if (parsedAmount === undefined) {
    return 'Invalid amount. Must be a non-negative integer';
  }

  const parsedValue = value === undefined ? 0n : parseAmount(value);
  if (parsedValue === undefined) {
    return 'Invalid value. Must be a non-negative integer';
  }

  return {
    ctx: { caller, value: parsedValue },
    kind: typeof kind === 'string' ? kind : undefined,
    amount: parsedAmount,
    target: typeof target === 'string' ? target : undefined,
  };
}

export function createKeeperAPI(
  env: KeeperEnvironment,
  storage: PositionStorage,
  sentinel: KeeperSentinel,
  logger: Logger,
  config: KeeperAPIConfig
) {
  const { ledger, oracle, custody } = env;
  const app = new Hono();

  app.use('*', cors());

  function failure(c: Context, error: unknown, operation: string) {
    if (isLedgerError(error)) {
      return c.json(
        { success: false, error: fromLedgerError(error) },
        LEDGER_ERROR_STATUS[error.code]
      );
    }
    logger.error({ error, operation }, 'Unexpected error handling request');
    return c.json(
      {
        success: false,
        error: createError(
          'InternalError',
          error instanceof Error ? error.message : 'Internal server error'
        ),
      },
      HTTP_STATUS.INTERNAL_SERVER_ERROR
    );
  }

  function badRequest(c: Context, message: string) {
    return c.json(
      { success: false, error: createError('BadRequest', message) },
      HTTP_STATUS.BAD_REQUEST
    );
  }

  async function readCall(
    c: Context,
    fields: { kind?: boolean; amount?: boolean; target?: boolean }
  ): Promise<ParsedCall | string> {
    const body = await readBody(c);
    if (!body) {
      return 'Request body must be a JSON object';
    }
    return parseCall(body, fields);
  }

  // Health check endpoint
  app.get('/health', (c) => {
    return c.json({
      status: 'healthy',
      service: 'keeper',
      timestamp: Date.now(),
      tick: ledger.getStats().tick.toString(),
      ...storage.getStats(),
      sentinel: sentinel.getStatus(),
    });
  });

  // Current collateral rate
  app.get('/rate', (c) => {
    try {
      const rate = oracle.getRate(config.collateralAssetId);
      return c.json({
        asset: config.collateralAssetId,
        rate: math.rateToDecimal(rate),
        scaledRate: rate.toString(),
        updatedAt: oracle.getLastUpdateTime(config.collateralAssetId),
      });
    } catch (error) {
      return c.json(
        { success: false, error: createError('NotFound', error instanceof Error ? error.message : String(error)) },
        HTTP_STATUS.NOT_FOUND
      );
    }
  });

  // Set the mock feed rate, then re-check every position
  app.put('/rate', async (c) => {
    const body = await readBody(c);
    const rate = body ? parseRate(body.rate) : undefined;

    if (rate === undefined) {
      return badRequest(c, 'Invalid rate. Must be a positive decimal');
    }

    try {
      oracle.setRate(config.collateralAssetId, rate);
      const sync = sentinel.handleRateUpdate(rate);
      return c.json({
        success: true,
        asset: config.collateralAssetId,
        rate: math.rateToDecimal(rate),
        sync,
      });
    } catch (error) {
      return failure(c, error, 'set-rate');
    }
  });

  // Mint mock collateral into a participant's wallet
  app.post('/faucet', async (c) => {
    const body = await readBody(c);
    if (!body || !isValidParticipant(body.participant)) {
      return badRequest(c, 'Invalid participant. Must be 1-64 characters without whitespace');
    }

    const amount = parseAmount(body.amount);
    if (amount === undefined || amount === 0n) {
      return badRequest(c, 'Invalid amount. Must be a positive integer');
    }

    custody.mint(body.participant, amount);
    logger.info({ participant: body.participant, amount: amount.toString() }, 'Faucet minted collateral');

    return c.json(
      {
        success: true,
        participant: body.participant,
        walletBalance: custody.balanceOf(body.participant).toString(),
      },
      HTTP_STATUS.CREATED
    );
  });

  app.post('/ledger/deposit', async (c) => {
    const call = await readCall(c, { kind: true, amount: true });
    if (typeof call === 'string') return badRequest(c, call);

    try {
      ledger.deposit(call.ctx, call.kind ?? '', call.amount);
      return c.json({ success: true });
    } catch (error) {
      return failure(c, error, 'deposit');
    }
  });

  app.post('/ledger/withdraw', async (c) => {
    const call = await readCall(c, { kind: true, amount: true });
    if (typeof call === 'string') return badRequest(c, call);

    try {
      const remaining = ledger.withdraw(call.ctx, call.kind ?? '', call.amount);
      return c.json({ success: true, remaining: remaining.toString() });
    } catch (error) {
      return failure(c, error, 'withdraw');
    }
  });

  app.post('/ledger/borrow', async (c) => {
    const call = await readCall(c, { amount: true });
    if (typeof call === 'string') return badRequest(c, call);

    try {
      const ratio = ledger.borrow(call.ctx, call.amount);
      return c.json({
        success: true,
        collateralRatio: ratio.toString(),
        collateralRatioPercent: formatRatio(ratio),
      });
    } catch (error) {
      return failure(c, error, 'borrow');
    }
  });

  app.post('/ledger/repay', async (c) => {
    const call = await readCall(c, { amount: true });
    if (typeof call === 'string') return badRequest(c, call);

    try {
      const remainingPrincipal = ledger.repay(call.ctx, call.amount);
      return c.json({ success: true, remainingPrincipal: remainingPrincipal.toString() });
    } catch (error) {
      return failure(c, error, 'repay');
    }
  });

  app.post('/ledger/liquidate', async (c) => {
    const call = await readCall(c, { target: true });
    if (typeof call === 'string') return badRequest(c, call);

    try {
      const result = ledger.liquidate(call.ctx, call.target ?? '');
      return c.json({ success: true, liquidation: serializeLiquidation(result) });
    } catch (error) {
      return failure(c, error, 'liquidate');
    }
  });

  // Deposit balance including pending interest
  app.get('/balances/:participant/:kind', (c) => {
    const participant = c.req.param('participant');
    const kind = c.req.param('kind');

    if (!isValidParticipant(participant)) {
      return badRequest(c, 'Invalid participant');
    }

    try {
      const balance = ledger.getBalance({ caller: participant }, kind);
      return c.json({ participant, kind, balance: balance.toString() });
    } catch (error) {
      return failure(c, error, 'balance');
    }
  });

  app.get('/ratio/:participant', (c) => {
    const participant = c.req.param('participant');

    if (!isValidParticipant(participant)) {
      return badRequest(c, 'Invalid participant');
    }

    try {
      const ratio = ledger.getCollateralRatio(participant);
      return c.json({
        participant,
        collateralRatio: ratio.toString(),
        collateralRatioPercent: formatRatio(ratio),
      });
    } catch (error) {
      return failure(c, error, 'ratio');
    }
  });

  // Snapshots from the last sync cycle
  app.get('/positions', (c) => {
    const positions = c.req.query('liquidatable') === 'true'
      ? storage.getLiquidatablePositions()
      : storage.getAllPositions();

    return c.json({
      positions: positions.map(serializeSnapshot),
      total: positions.length,
    });
  });

  // Live position read from the ledger
  app.get('/positions/:participant', (c) => {
    const participant = c.req.param('participant');

    if (!isValidParticipant(participant)) {
      return badRequest(c, 'Invalid participant');
    }

    try {
      return c.json({
        position: serializePosition(ledger.getPosition(participant)),
        tick: ledger.getStats().tick.toString(),
      });
    } catch (error) {
      return failure(c, error, 'position');
    }
  });

  // Liquidation history (with pagination)
  app.get('/liquidations', (c) => {
    const limitParam = c.req.query('limit');
    const offsetParam = c.req.query('offset');

    const limit = limitParam ? parseInt(limitParam) : 100;
    const offset = offsetParam ? parseInt(offsetParam) : 0;

    if (isNaN(limit) || limit < 1 || limit > 1000) {
      return badRequest(c, 'Invalid limit. Must be between 1 and 1000');
    }

    if (isNaN(offset) || offset < 0) {
      return badRequest(c, 'Invalid offset. Must be >= 0');
    }

    const result = storage.getLiquidations(limit, offset);

    return c.json({
      liquidations: result.liquidations.map(serializeLiquidationRecord),
      total: result.total,
      limit,
      offset,
    });
  });

  app.get('/stats', (c) => {
    const { tick, vaultBalance, tables } = ledger.getStats();

    return c.json({
      tick: tick.toString(),
      vaultBalance: vaultBalance.toString(),
      custodyBalance: custody.custodyBalance().toString(),
      tables,
      ...storage.getStats(),
    });
  });

  // Force a sync cycle (admin endpoint)
  app.post('/sync', (c) => {
    try {
      const summary = sentinel.forceSync();
      return c.json({ success: true, summary });
    } catch (error) {
      return failure(c, error, 'sync');
    }
  });

  return app;
}
