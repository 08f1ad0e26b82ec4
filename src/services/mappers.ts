/**
 * Row → API shape conversions shared by the services.
 */

import type { EntryRow, UserRow } from '../types/database.js';
import type { UserSummaryRow } from '../repositories/IDictionaryRepository.js';
import type { ContributorSummary, EntryResponse } from '../types/api.js';
import type { User } from '../types/models.js';
import { entryScore } from '../gamification/entry-state.js';

export function toContributorSummary(row: UserSummaryRow): ContributorSummary {
  return { id: row.id, displayName: row.display_name, level: row.level };
}

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    displayName: row.display_name,
    isModerator: row.is_moderator,
    points: row.points,
    level: row.level,
    contributionsCount: row.contributions_count,
    verificationsCount: row.verifications_count,
    joinedAt: new Date(row.joined_at),
  };
}

export function toEntryResponse(
  row: EntryRow,
  contributor: ContributorSummary | null
): EntryResponse {
  return {
    id: row.id,
    kolokwaText: row.kolokwa_text,
    englishTranslation: row.english_translation,
    literalTranslation: row.literal_translation,
    entryType: row.entry_type,
    contextExplanation: row.context_explanation,
    exampleKolokwa: row.example_kolokwa,
    exampleEnglish: row.example_english,
    culturalNotes: row.cultural_notes,
    pronunciationGuide: row.pronunciation_guide,
    region: row.region,
    tags: row.tags,
    status: row.status,
    upvotes: row.upvotes,
    downvotes: row.downvotes,
    verificationCount: row.verification_count,
    score: entryScore(row),
    contributor,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    verifiedAt: row.verified_at,
  };
}
