import type { TimeGateConfig } from '../config/run-config.js';

/** Hour of day (0-23) of `now` on the wall clock of `timeZone`. */
export function localHour(now: Date, timeZone: string): number {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hour: 'numeric',
    hourCycle: 'h23',
  }).formatToParts(now);
  const hour = parts.find(p => p.type === 'hour');
  return Number(hour?.value ?? Number.NaN);
}

/**
 * True when the run may proceed. The external cron fires at fixed UTC times,
 * so only the local hour is compared; minutes are ignored.
 */
export function isWithinWindow(now: Date, gate: TimeGateConfig): boolean {
  if (!gate.enabled) return true;
  return localHour(now, gate.timezone) === gate.hour;
}
