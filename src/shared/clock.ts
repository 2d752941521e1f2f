import { z } from 'zod';
import { config } from './config';

/**
 * Wall clock for everything that stamps or checks time. Under NODE_ENV=test
 * it can be frozen, either directly or per request through X-Test-Now;
 * otherwise it is always the real time.
 */

// Epoch milliseconds, or an ISO-8601 date/time with an offset
const testNowHeader = z.union([
  z.string().regex(/^\d+$/).transform(ms => new Date(Number(ms))),
  z.string().datetime({ offset: true }).transform(iso => new Date(iso)),
]);

let frozenAt: Date | null = null;

export function setTestNow(date: Date | null): void {
  if (config.isTest) {
    frozenAt = date;
  }
}

export const getNow = (): Date => (config.isTest && frozenAt ? frozenAt : new Date());

export const toEpochSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

/** The instant an X-Test-Now value names, or null if it names none. */
export function parseTestNow(header: string | undefined): Date | null {
  const parsed = testNowHeader.safeParse(header);
  return parsed.success ? parsed.data : null;
}
