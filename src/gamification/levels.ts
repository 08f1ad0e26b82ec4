/**
 * Contributor levels.
 * A level is a pure function of a user's point balance; the stored `level`
 * column is a cache of this and is rewritten whenever points change.
 */

import type { UserLevel } from '../types/models.js';
import type { LevelInfo } from '../types/api.js';

interface LevelDefinition {
  key: UserLevel;
  name: string;
  threshold: number;
}

/** Ascending by threshold. */
export const LEVELS: readonly LevelDefinition[] = [
  { key: 'beginner', name: 'Beginner', threshold: 0 },
  { key: 'contributor', name: 'Contributor', threshold: 100 },
  { key: 'expert', name: 'Expert', threshold: 500 },
  { key: 'master', name: 'Master', threshold: 1000 },
  { key: 'legend', name: 'Legend', threshold: 2500 },
  { key: 'champion', name: 'Kolokwa Champion', threshold: 5000 },
];

function levelIndex(points: number): number {
  let index = 0;
  for (let i = 0; i < LEVELS.length; i++) {
    if (points >= LEVELS[i].threshold) index = i;
    else break;
  }
  return index;
}

export function levelForPoints(points: number): UserLevel {
  return LEVELS[levelIndex(points)].key;
}

export function levelInfo(points: number): LevelInfo {
  const index = levelIndex(points);
  const current = LEVELS[index];
  const next = index < LEVELS.length - 1 ? LEVELS[index + 1] : null;

  let progress = 0;
  if (next) {
    const span = next.threshold - current.threshold;
    progress = Math.min(100, Math.max(0, ((points - current.threshold) / span) * 100));
  }

  return {
    current: { ...current },
    next: next ? { ...next } : null,
    progress,
  };
}
