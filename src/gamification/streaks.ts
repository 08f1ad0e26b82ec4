/**
 * Daily contribution streaks, at UTC day granularity.
 */

export interface StreakState {
  current: number;
  longest: number;
  /** YYYY-MM-DD */
  lastDay: string | null;
}

const MS_PER_DAY = 86_400_000;

export function toDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function daysBetween(from: string, to: string): number {
  return Math.round((Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / MS_PER_DAY);
}

/**
 * Advance a streak for a contribution made on `today`.
 * Returns null when the streak is unchanged (already counted today).
 */
export function advanceStreak(state: StreakState, today: string): StreakState | null {
  let current: number;

  if (state.lastDay === null) {
    current = 1;
  } else {
    const gap = daysBetween(state.lastDay, today);
    // A last day in the future only happens with clock skew; count it as today.
    if (gap <= 0) return null;
    current = gap === 1 ? state.current + 1 : 1;
  }

  return {
    current,
    longest: Math.max(state.longest, current),
    lastDay: today,
  };
}

export function streakBonusDue(current: number, every: number): boolean {
  return current > 0 && current % every === 0;
}
