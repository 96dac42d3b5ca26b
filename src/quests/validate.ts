import { z } from 'zod';
import { QuestValidationError } from './errors';
import type { NewQuest, QuestChanges } from './types';

/**
 * Input validation for quest writes. Limits follow the column sizes in
 * `sql/quests.sql`.
 *
 * @module quests/validate
 */

export const TITLE_MAX = 256;
export const DESCRIPTION_MAX = 2048;
export const NAME_MAX = 256;

const optionalText = (max: number, label: string) =>
  z
    .string()
    .trim()
    .max(max, `${label} must be at most ${max} characters`)
    .optional()
    .transform(v => (v ? v : undefined));

const changesSchema = z.object({
  title: optionalText(TITLE_MAX, 'title'),
  description: optionalText(DESCRIPTION_MAX, 'description'),
  questGiver: optionalText(NAME_MAX, 'quest giver'),
  locationGiven: optionalText(NAME_MAX, 'location'),
});

const newQuestSchema = changesSchema.extend({
  title: z
    .string()
    .trim()
    .min(1, 'a quest needs a title')
    .max(TITLE_MAX, `title must be at most ${TITLE_MAX} characters`),
});

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'invalid quest';
}

/** Trim fields, drop empty optionals and enforce lengths. */
export function validateNewQuest(input: NewQuest): NewQuest {
  const parsed = newQuestSchema.safeParse(input);
  if (!parsed.success) throw new QuestValidationError(firstIssue(parsed.error));
  return parsed.data;
}

export function validateChanges(changes: QuestChanges): QuestChanges {
  const parsed = changesSchema.safeParse(changes);
  if (!parsed.success) throw new QuestValidationError(firstIssue(parsed.error));
  return parsed.data;
}

/** Description after appending `detail`, or a validation error if too long. */
export function appendDetail(description: string | null, detail: string, separator: string): string {
  const next = description ? `${description}${separator}${detail}` : detail;
  if (next.length > DESCRIPTION_MAX) {
    throw new QuestValidationError(`description must be at most ${DESCRIPTION_MAX} characters`);
  }
  return next;
}
