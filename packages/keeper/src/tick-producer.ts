import type { Logger } from 'pino';
import type { ManualClock } from '@lendbook/ledger';

export interface TickProducerConfig {
  tickInterval: number; // milliseconds
}

export type TickCallback = (tick: bigint) => void;

/**
 * Tick Producer - advances the ledger clock on a fixed interval,
 * standing in for block production in a local environment
 */
export class TickProducer {
  private clock: ManualClock;
  private config: TickProducerConfig;
  private logger: Logger;
  private intervalId?: NodeJS.Timeout;
  private isRunning: boolean = false;
  private callbacks: TickCallback[] = [];

  constructor(clock: ManualClock, config: TickProducerConfig, logger: Logger) {
    this.clock = clock;
    this.config = config;
    this.logger = logger;
  }

  /**
   * Register a callback run after every produced tick
   */
  onTick(callback: TickCallback): void {
    this.callbacks.push(callback);
  }

  start(): void {
    if (this.isRunning) {
      this.logger.warn('Tick producer is already running');
      return;
    }

    this.logger.info({ interval: this.config.tickInterval }, 'Starting tick producer');
    this.isRunning = true;

    this.intervalId = setInterval(() => {
      this.produceTick();
    }, this.config.tickInterval);
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
    }

    this.isRunning = false;
    this.logger.info('Tick producer stopped');
  }

  /**
   * Advance the clock by one tick and notify callbacks
   */
  produceTick(): bigint {
    const tick = this.clock.advance(1n);
    this.logger.trace({ tick: tick.toString() }, 'Tick produced');

    for (const callback of this.callbacks) {
      try {
        callback(tick);
      } catch (error) {
        this.logger.error({ error, tick: tick.toString() }, 'Tick callback failed');
      }
    }

    return tick;
  }

  getCurrentTick(): bigint {
    return this.clock.currentTick();
  }

  get running(): boolean {
    return this.isRunning;
  }
}
