import { describe, it, expect } from 'vitest';
import { CostLedger } from '../src/ledger.js';
import { MemoryLedgerBackend } from '../src/stores/memory.js';
import { manualClock } from './helpers.js';

function createLedger(limits = { dailyLimitUsd: 1, monthlyBudgetUsd: 10 }) {
  const time = manualClock();
  const backend = new MemoryLedgerBackend();
  const ledger = new CostLedger({ backend, limits, clock: time.clock });
  return { time, backend, ledger };
}

const spend = (costUsd: number) => ({ provider: 'openai', costUsd, tokensIn: 100, tokensOut: 50 });

describe('CostLedger', () => {
  it('counts outstanding reservations against the daily limit', async () => {
    const { ledger } = createLedger();

    const first = await ledger.reserve(0.6);
    expect(first).not.toBeNull();
    expect(await ledger.reserve(0.5)).toBeNull();

    await ledger.release(first!);
    expect(await ledger.reserve(0.5)).not.toBeNull();
  });

  it('reconciles a reservation to the actual cost', async () => {
    const { ledger } = createLedger();

    const reservation = await ledger.reserve(0.6);
    await ledger.record(reservation, spend(0.2));

    const summary = await ledger.summary();
    expect(summary.dailySpentUsd).toBeCloseTo(0.2);
    expect(summary.reservedUsd).toBe(0);
    expect(await ledger.canSpend(0.8)).toBe(true);
    expect(await ledger.canSpend(0.81)).toBe(false);
  });

  it('blocks on the monthly budget even when the day is empty', async () => {
    const { ledger, backend } = createLedger({ dailyLimitUsd: 5, monthlyBudgetUsd: 10 });
    await backend.saveDay({ date: '2026-03-01', provider: 'openai', calls: 40, tokensIn: 1, tokensOut: 1, costUsd: 9.5 });
    await backend.saveDay({ date: '2026-02-28', provider: 'openai', calls: 40, tokensIn: 1, tokensOut: 1, costUsd: 8 });

    expect(await ledger.reserve(0.6)).toBeNull();
    expect(await ledger.canSpend(0.4)).toBe(true);

    const summary = await ledger.summary();
    expect(summary.monthlySpentUsd).toBe(9.5);
    expect(summary.dailySpentUsd).toBe(0);
    expect(summary.month).toBe('2026-03');
  });

  it('sums the month from its days across providers', async () => {
    const { ledger, backend } = createLedger({ dailyLimitUsd: 5, monthlyBudgetUsd: 50 });
    await backend.saveDay({ date: '2026-03-02', provider: 'openai', calls: 1, tokensIn: 1, tokensOut: 1, costUsd: 1.5 });
    await backend.saveDay({ date: '2026-03-03', provider: 'deepseek', calls: 1, tokensIn: 1, tokensOut: 1, costUsd: 2 });

    await ledger.record(null, spend(0.5));

    const summary = await ledger.summary();
    expect(summary.monthlySpentUsd).toBe(4);
    expect(summary.dailySpentUsd).toBe(0.5);
    expect(summary.monthlyRemainingUsd).toBe(46);
  });

  it('persists the day on every record', async () => {
    const { ledger, backend } = createLedger();

    await ledger.record(await ledger.reserve(0.1), spend(0.05));
    await ledger.record(await ledger.reserve(0.1), spend(0.05));

    expect(backend.days.get('2026-03-15|openai')).toEqual({
      date: '2026-03-15',
      provider: 'openai',
      calls: 2,
      tokensIn: 200,
      tokensOut: 100,
      costUsd: 0.1,
    });

    const restarted = new CostLedger({ backend, limits: { dailyLimitUsd: 1, monthlyBudgetUsd: 10 }, clock: () => Date.UTC(2026, 2, 15, 18) });
    expect((await restarted.summary()).dailySpentUsd).toBe(0.1);
  });

  it('refuses to settle a reservation twice', async () => {
    const { ledger } = createLedger();
    const reservation = await ledger.reserve(0.1);

    await ledger.record(reservation, spend(0.05));

    await expect(ledger.record(reservation, spend(0.05))).rejects.toThrow('already settled');
    expect((await ledger.summary()).dailySpentUsd).toBe(0.05);
  });

  it('prunes days past retention when opened', async () => {
    const { ledger, backend } = createLedger();
    await backend.saveDay({ date: '2025-12-01', provider: 'openai', calls: 1, tokensIn: 1, tokensOut: 1, costUsd: 1 });
    await backend.saveDay({ date: '2026-01-10', provider: 'openai', calls: 1, tokensIn: 1, tokensOut: 1, costUsd: 1 });

    await ledger.open();

    expect([...backend.days.keys()]).toEqual(['2026-01-10|openai']);
  });

  it('starts a new day at UTC midnight', async () => {
    const { ledger, time } = createLedger();

    await ledger.record(null, spend(0.9));
    expect(await ledger.canSpend(0.5)).toBe(false);

    time.set(Date.UTC(2026, 2, 16, 0, 0, 1));
    expect(await ledger.canSpend(0.5)).toBe(true);
  });

  it('never overspends under concurrent reservations', async () => {
    const { ledger } = createLedger({ dailyLimitUsd: 1, monthlyBudgetUsd: 10 });

    const attempts = Array.from({ length: 50 }, async (_, index) => {
      const reservation = await ledger.reserve(0.05);
      if (!reservation) {
        return false;
      }

      await new Promise((resolve) => setTimeout(resolve, index % 5));
      await ledger.record(reservation, spend(0.05));
      return true;
    });

    const granted = (await Promise.all(attempts)).filter(Boolean).length;
    const summary = await ledger.summary();

    expect(granted).toBe(20);
    expect(summary.dailySpentUsd).toBeLessThanOrEqual(1 + 1e-9);
  });
});
