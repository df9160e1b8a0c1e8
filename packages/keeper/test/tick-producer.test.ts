import { describe, test } from 'node:test';
import { expect } from 'expect';
import { ManualClock } from '@lendbook/ledger';
import { TickProducer } from '../src/tick-producer';
import { logger } from './helpers';

describe('TickProducer', () => {
  test('advances the clock one tick at a time', () => {
    const clock = new ManualClock();
    const producer = new TickProducer(clock, { tickInterval: 60_000 }, logger);

    expect(producer.produceTick()).toBe(2n);
    expect(producer.produceTick()).toBe(3n);
    expect(producer.getCurrentTick()).toBe(3n);
    expect(clock.currentTick()).toBe(3n);
  });

  test('notifies callbacks even when one of them throws', () => {
    const producer = new TickProducer(new ManualClock(5n), { tickInterval: 60_000 }, logger);
    const seen: bigint[] = [];
    producer.onTick(() => {
      throw new Error('callback failure');
    });
    producer.onTick((tick) => seen.push(tick));

    producer.produceTick();

    expect(seen).toEqual([6n]);
  });

  test('starts and stops', () => {
    const producer = new TickProducer(new ManualClock(), { tickInterval: 60_000 }, logger);

    producer.start();
    expect(producer.running).toBe(true);

    producer.stop();
    expect(producer.running).toBe(false);
    expect(producer.getCurrentTick()).toBe(1n);
  });
});
