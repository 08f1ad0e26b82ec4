/**
 * Input rules for entry submission and edits.
 */

import type { EntryContent, EntryRow } from '../types/database.js';
import type { SubmitEntryRequest, UpdateEntryRequest } from '../types/api.js';
import { ENTRY_TYPES, type EntryType } from '../types/models.js';
import { ConflictError, ValidationError } from '../errors.js';

export const MAX_TAGS = 20;
const MAX_TAG_LENGTH = 50;
const MAX_TEXT_LENGTH = 200;
const MAX_TRANSLATION_LENGTH = 500;
const MAX_NOTE_LENGTH = 2000;

type OptionalTextField = Exclude<
  keyof EntryContent,
  'kolokwa_text' | 'english_translation' | 'entry_type' | 'tags'
>;

const OPTIONAL_FIELDS: ReadonlyArray<readonly [OptionalTextField, keyof SubmitEntryRequest]> = [
  ['literal_translation', 'literalTranslation'],
  ['context_explanation', 'contextExplanation'],
  ['example_kolokwa', 'exampleKolokwa'],
  ['example_english', 'exampleEnglish'],
  ['cultural_notes', 'culturalNotes'],
  ['pronunciation_guide', 'pronunciationGuide'],
  ['region', 'region'],
];

function requiredText(value: unknown, field: string, maxLength: number): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${field} is required`);
  }
  const trimmed = value.trim();
  if (trimmed.length > maxLength) {
    throw new ValidationError(`${field} must be ${maxLength} characters or less`);
  }
  return trimmed;
}

function optionalText(value: unknown, field: string): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') throw new ValidationError(`${field} must be a string`);
  const trimmed = value.trim();
  if (trimmed.length > MAX_NOTE_LENGTH) {
    throw new ValidationError(`${field} must be ${MAX_NOTE_LENGTH} characters or less`);
  }
  return trimmed === '' ? null : trimmed;
}

function entryType(value: unknown): EntryType {
  const match = ENTRY_TYPES.find((t) => t === value);
  if (!match) {
    throw new ValidationError(`entryType must be one of: ${ENTRY_TYPES.join(', ')}`);
  }
  return match;
}

/** Trimmed, de-duplicated (case-insensitive), empty tags dropped. */
export function normalizeTags(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new ValidationError('tags must be an array');

  const seen = new Set<string>();
  const tags: string[] = [];
  for (const raw of value) {
    if (typeof raw !== 'string') throw new ValidationError('tags must be strings');
    const tag = raw.trim();
    if (!tag || seen.has(tag.toLowerCase())) continue;
    if (tag.length > MAX_TAG_LENGTH) {
      throw new ValidationError(`Tags must be ${MAX_TAG_LENGTH} characters or less`);
    }
    seen.add(tag.toLowerCase());
    tags.push(tag);
  }

  if (tags.length > MAX_TAGS) {
    throw new ValidationError(`An entry can have at most ${MAX_TAGS} tags`);
  }
  return tags;
}

export function normalizeSubmission(input: SubmitEntryRequest): EntryContent {
  const content: EntryContent = {
    kolokwa_text: requiredText(input.kolokwaText, 'kolokwaText', MAX_TEXT_LENGTH),
    english_translation: requiredText(
      input.englishTranslation,
      'englishTranslation',
      MAX_TRANSLATION_LENGTH
    ),
    entry_type: input.entryType === undefined ? 'word' : entryType(input.entryType),
    tags: normalizeTags(input.tags),
    literal_translation: null,
    context_explanation: null,
    example_kolokwa: null,
    example_english: null,
    cultural_notes: null,
    pronunciation_guide: null,
    region: null,
  };

  for (const [column, field] of OPTIONAL_FIELDS) {
    content[column] = optionalText(input[field], field);
  }
  return content;
}

/** Only the fields present in the request; at least one is required. */
export function normalizeUpdate(input: UpdateEntryRequest): Partial<EntryContent> {
  const changes: Partial<EntryContent> = {};

  if (input.kolokwaText !== undefined) {
    changes.kolokwa_text = requiredText(input.kolokwaText, 'kolokwaText', MAX_TEXT_LENGTH);
  }
  if (input.englishTranslation !== undefined) {
    changes.english_translation = requiredText(
      input.englishTranslation,
      'englishTranslation',
      MAX_TRANSLATION_LENGTH
    );
  }
  if (input.entryType !== undefined) changes.entry_type = entryType(input.entryType);
  if (input.tags !== undefined) changes.tags = normalizeTags(input.tags);

  for (const [column, field] of OPTIONAL_FIELDS) {
    if (input[field] !== undefined) {
      changes[column] = optionalText(input[field], field);
    }
  }

  if (Object.keys(changes).length === 0) {
    throw new ValidationError('No changes supplied');
  }
  return changes;
}

/**
 * The conflict to raise when `kolokwaText` is already in the dictionary, or
 * null. Rejected and deleted entries never block a resubmission.
 */
export function duplicateConflict(
  existing: EntryRow[],
  kolokwaText: string,
  userId: string
): ConflictError | null {
  const verified = existing.find((e) => e.status === 'verified');
  if (verified) {
    return new ConflictError(
      'ALREADY_VERIFIED',
      `The word "${kolokwaText}" already exists in the dictionary. ` +
        'Please search for it to view the existing entry.',
      { entryId: verified.id }
    );
  }

  const open = existing.find((e) => e.status === 'pending' || e.status === 'needs_revision');
  if (!open) return null;

  if (open.contributor_id === userId) {
    return new ConflictError(
      'ALREADY_PENDING_OWN',
      `You have already submitted "${kolokwaText}" and it is currently pending review. ` +
        'Please wait for verification before submitting again.',
      { entryId: open.id }
    );
  }
  return new ConflictError(
    'ALREADY_PENDING',
    `The word "${kolokwaText}" has already been submitted and is pending review. ` +
      'Please check back later.',
    { entryId: open.id }
  );
}
