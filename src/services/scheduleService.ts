import type { Advisory, ScheduleEntry, ScheduleResult, SchedulePresetKey, StageShare } from '../types';
import { SCHEDULE_PRESETS } from '../constants';
import { APP_CONFIG } from '../config';

export function schedulePresetShares(key: SchedulePresetKey): StageShare[] {
  const preset = SCHEDULE_PRESETS[key];
  if (!preset) throw new RangeError(`Unknown schedule preset "${key}"`);
  return preset.stages.map(s => ({ ...s }));
}

export function sumPercentages(shares: readonly StageShare[]): number {
  return shares.reduce((acc, s) => acc + s.pct, 0);
}

/**
 * Splits `total` across stages by percentage, keeping stage order.
 *
 * Every entry is computed even when the shares do not add up to 100; the
 * mismatch comes back as a SCHEDULE_SUM_MISMATCH advisory instead.
 */
export function apportionSchedule(total: number, shares: readonly StageShare[]): ScheduleResult {
  const entries: ScheduleEntry[] = shares.map(s => ({
    stage: s.stage,
    pct: s.pct,
    value: (s.pct / 100) * total,
  }));
  const totalPct = sumPercentages(shares);
  const advisories: Advisory[] = [];
  if (Math.abs(totalPct - 100) > APP_CONFIG.scheduleSumTolerance) {
    advisories.push({
      code: 'SCHEDULE_SUM_MISMATCH',
      severity: 'warning',
      message: `Stage percentages add up to ${totalPct}%; they must total exactly 100%.`,
    });
  }
  return { entries, totalPct, advisories };
}
