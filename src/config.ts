/**
 * Runtime configuration.
 * Reads environment variables once at startup; every engine knob has a default
 * so tests and local runs need nothing set.
 */

export interface PointAmounts {
  /** New entry submitted. */
  contribution: number;
  /** Casting a vote (participation). */
  vote: number;
  /** An `accurate` verification that does not verify the entry. */
  verification: number;
  /** The verification that pushes an entry over the verify threshold. */
  verificationTransition: number;
  /** `incorrect` / `needs_revision` verifications and rejections. */
  review: number;
  /** Contributor reward when their entry becomes verified. */
  contributionVerified: number;
  /** Contributor reward for each `accurate` verification received. */
  verificationReceived: number;
}

export interface EngineConfig {
  verifyThreshold: number;
  rejectThreshold: number;
  points: PointAmounts;
  badgeBonus: { divisor: number; minimum: number };
  streakBonusEvery: number;
  streakBonusMultiplier: number;
  /** Joined on or before this instant → early adopter. Null means "a year ago". */
  earlyAdopterCutoff: Date | null;
  popularEntryUpvotes: number;
  popularEntryCount: number;
}

export interface AppConfig {
  engine: EngineConfig;
  databaseUrl: string | null;
  supabase: { url: string; serviceRoleKey: string } | null;
  openaiApiKey: string | null;
  axiom: { apiToken: string; dataset: string } | null;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  verifyThreshold: 3,
  rejectThreshold: 2,
  points: {
    contribution: 2,
    vote: 1,
    verification: 3,
    verificationTransition: 5,
    review: 2,
    contributionVerified: 10,
    verificationReceived: 2,
  },
  badgeBonus: { divisor: 10, minimum: 5 },
  streakBonusEvery: 7,
  streakBonusMultiplier: 2,
  earlyAdopterCutoff: null,
  popularEntryUpvotes: 10,
  popularEntryCount: 3,
};

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const d = DEFAULT_ENGINE_CONFIG;

  const engine: EngineConfig = {
    verifyThreshold: positiveInt(env, 'VERIFY_THRESHOLD', d.verifyThreshold),
    rejectThreshold: positiveInt(env, 'REJECT_THRESHOLD', d.rejectThreshold),
    points: {
      contribution: positiveInt(env, 'POINTS_CONTRIBUTION', d.points.contribution),
      vote: positiveInt(env, 'POINTS_VOTE', d.points.vote),
      verification: positiveInt(env, 'POINTS_VERIFICATION', d.points.verification),
      verificationTransition: positiveInt(
        env,
        'POINTS_VERIFICATION_TRANSITION',
        d.points.verificationTransition
      ),
      review: positiveInt(env, 'POINTS_REVIEW', d.points.review),
      contributionVerified: positiveInt(
        env,
        'POINTS_CONTRIBUTION_VERIFIED',
        d.points.contributionVerified
      ),
      verificationReceived: positiveInt(
        env,
        'POINTS_VERIFICATION_RECEIVED',
        d.points.verificationReceived
      ),
    },
    badgeBonus: {
      divisor: positiveInt(env, 'BADGE_BONUS_DIVISOR', d.badgeBonus.divisor),
      minimum: positiveInt(env, 'BADGE_BONUS_MINIMUM', d.badgeBonus.minimum),
    },
    streakBonusEvery: positiveInt(env, 'STREAK_BONUS_EVERY', d.streakBonusEvery),
    streakBonusMultiplier: positiveInt(env, 'STREAK_BONUS_MULTIPLIER', d.streakBonusMultiplier),
    earlyAdopterCutoff: optionalDate(env, 'EARLY_ADOPTER_CUTOFF'),
    popularEntryUpvotes: positiveInt(env, 'POPULAR_ENTRY_UPVOTES', d.popularEntryUpvotes),
    popularEntryCount: positiveInt(env, 'POPULAR_ENTRY_COUNT', d.popularEntryCount),
  };

  const supabaseUrl = nonEmpty(env.SUPABASE_URL);
  const supabaseKey = nonEmpty(env.SUPABASE_SERVICE_ROLE_KEY);
  const axiomToken = nonEmpty(env.AXIOM_API_KEY);
  const axiomDataset = nonEmpty(env.AXIOM_DATASET);

  return {
    engine,
    databaseUrl: nonEmpty(env.DATABASE_URL),
    supabase:
      supabaseUrl && supabaseKey ? { url: supabaseUrl, serviceRoleKey: supabaseKey } : null,
    openaiApiKey: nonEmpty(env.OPENAI_API_KEY),
    axiom: axiomToken && axiomDataset ? { apiToken: axiomToken, dataset: axiomDataset } : null,
  };
}

// ── Parsing helpers ──

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = nonEmpty(env[name]);
  if (raw === null) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function optionalDate(env: Env, name: string): Date | null {
  const raw = nonEmpty(env[name]);
  if (raw === null) return null;

  const date = new Date(raw);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`${name} must be an ISO-8601 date, got "${raw}"`);
  }
  return date;
}
