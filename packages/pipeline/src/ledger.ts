import { DAY_MS, dayKey, monthKey, systemClock, type Clock } from './clock.js';
import { SerialQueue } from './serial.js';

export const DEFAULT_RETENTION_DAYS = 90;
// Tolerance for float sums of USD amounts.
const EPSILON_USD = 1e-9;

/** Per-day, per-provider aggregate. The only persisted ledger shape. */
export interface LedgerDay {
  date: string;
  provider: string;
  calls: number;
  tokensIn: number;
  tokensOut: number;
  costUsd: number;
}

export interface LedgerBackend {
  loadSince(fromDate: string): Promise<LedgerDay[]>;
  saveDay(day: LedgerDay): Promise<void>;
  deleteBefore(date: string): Promise<number>;
}

export interface BudgetLimits {
  dailyLimitUsd: number;
  monthlyBudgetUsd: number;
}

export interface Reservation {
  readonly id: number;
  readonly amountUsd: number;
}

export interface SpendEntry {
  provider: string;
  costUsd: number;
  tokensIn: number;
  tokensOut: number;
}

export interface LedgerSummary {
  date: string;
  month: string;
  dailySpentUsd: number;
  monthlySpentUsd: number;
  reservedUsd: number;
  dailyRemainingUsd: number;
  monthlyRemainingUsd: number;
}

export interface CostLedgerOptions {
  backend: LedgerBackend;
  limits: BudgetLimits;
  clock?: Clock;
  retentionDays?: number;
}

/**
 * Spend tracking against a daily limit and a monthly budget.
 *
 * Every operation runs through one serial queue, so a check and the matching
 * reservation are atomic with respect to other callers. Paid calls happen
 * outside the queue: `reserve` holds the estimate, then `record` commits the
 * actual cost (refunding the difference) or `release` returns it.
 * Assumes a single writer process per backend.
 */
export class CostLedger {
  private readonly backend: LedgerBackend;
  private readonly limits: BudgetLimits;
  private readonly clock: Clock;
  private readonly retentionDays: number;
  private readonly queue = new SerialQueue();
  private readonly days = new Map<string, LedgerDay>();
  private readonly reservations = new Map<number, number>();
  private nextReservationId = 1;
  private loaded = false;

  constructor(options: CostLedgerOptions) {
    this.backend = options.backend;
    this.limits = options.limits;
    this.clock = options.clock ?? systemClock;
    this.retentionDays = options.retentionDays ?? DEFAULT_RETENTION_DAYS;
  }

  /** Load persisted days and prune those past retention. Called lazily otherwise. */
  open(): Promise<void> {
    return this.queue.run(() => this.ensureLoaded());
  }

  canSpend(estimatedUsd: number): Promise<boolean> {
    return this.queue.run(async () => {
      await this.ensureLoaded();
      return this.fits(estimatedUsd);
    });
  }

  reserve(estimatedUsd: number): Promise<Reservation | null> {
    return this.queue.run(async () => {
      await this.ensureLoaded();
      if (!this.fits(estimatedUsd)) {
        return null;
      }

      const reservation: Reservation = { id: this.nextReservationId++, amountUsd: Math.max(0, estimatedUsd) };
      this.reservations.set(reservation.id, reservation.amountUsd);
      return reservation;
    });
  }

  /**
   * Commit one completed call. The reservation, if any, is consumed; recording
   * against an already settled reservation throws.
   */
  record(reservation: Reservation | null, entry: SpendEntry): Promise<void> {
    return this.queue.run(async () => {
      await this.ensureLoaded();
      if (reservation) {
        if (!this.reservations.delete(reservation.id)) {
          throw new Error(`reservation ${reservation.id} is already settled`);
        }
      }

      const date = dayKey(this.clock());
      const key = `${date}|${entry.provider}`;
      const current = this.days.get(key) ?? {
        date,
        provider: entry.provider,
        calls: 0,
        tokensIn: 0,
        tokensOut: 0,
        costUsd: 0,
      };
      const next: LedgerDay = {
        ...current,
        calls: current.calls + 1,
        tokensIn: current.tokensIn + entry.tokensIn,
        tokensOut: current.tokensOut + entry.tokensOut,
        costUsd: current.costUsd + Math.max(0, entry.costUsd),
      };

      this.days.set(key, next);
      await this.backend.saveDay({ ...next });
    });
  }

  release(reservation: Reservation): Promise<void> {
    return this.queue.run(() => {
      this.reservations.delete(reservation.id);
    });
  }

  summary(): Promise<LedgerSummary> {
    return this.queue.run(async () => {
      await this.ensureLoaded();
      const now = this.clock();
      const date = dayKey(now);
      const month = monthKey(now);
      const dailySpentUsd = this.spentOn(date);
      const monthlySpentUsd = this.spentInMonth(month);

      return {
        date,
        month,
        dailySpentUsd,
        monthlySpentUsd,
        reservedUsd: this.reservedTotal(),
        dailyRemainingUsd: Math.max(0, this.limits.dailyLimitUsd - dailySpentUsd),
        monthlyRemainingUsd: Math.max(0, this.limits.monthlyBudgetUsd - monthlySpentUsd),
      };
    });
  }

  private async ensureLoaded(): Promise<void> {
    if (this.loaded) {
      return;
    }

    const cutoff = dayKey(this.clock() - this.retentionDays * DAY_MS);
    await this.backend.deleteBefore(cutoff);
    const rows = await this.backend.loadSince(cutoff);
    for (const row of rows) {
      this.days.set(`${row.date}|${row.provider}`, { ...row });
    }

    this.loaded = true;
  }

  private fits(estimatedUsd: number): boolean {
    if (!Number.isFinite(estimatedUsd)) {
      return false;
    }

    const now = this.clock();
    const pending = this.reservedTotal() + Math.max(0, estimatedUsd);
    const withinDay = this.spentOn(dayKey(now)) + pending <= this.limits.dailyLimitUsd + EPSILON_USD;
    const withinMonth = this.spentInMonth(monthKey(now)) + pending <= this.limits.monthlyBudgetUsd + EPSILON_USD;
    return withinDay && withinMonth;
  }

  private spentOn(date: string): number {
    let total = 0;
    for (const day of this.days.values()) {
      if (day.date === date) {
        total += day.costUsd;
      }
    }

    return total;
  }

  // Monthly spend is always the sum of the month's days.
  private spentInMonth(month: string): number {
    let total = 0;
    for (const day of this.days.values()) {
      if (day.date.startsWith(`${month}-`)) {
        total += day.costUsd;
      }
    }

    return total;
  }

  private reservedTotal(): number {
    let total = 0;
    for (const amount of this.reservations.values()) {
      total += amount;
    }

    return total;
  }
}
