import { DETAIL_SEPARATOR, type Quest, type QuestListKind, type QuestSummary } from './types';

/**
 * Chat rendering for quests. Titles are shown title-cased whatever case
 * they were stored in.
 *
 * @module quests/format
 */

const LIST_HEADINGS: Record<QuestListKind, string> = {
  active: 'Active quests',
  newest: 'Newest quests',
  updated: 'Recently updated quests',
  inactive: 'Completed quests',
  all: 'All quests',
};

const EMPTY_LIST: Record<QuestListKind, string> = {
  active: 'No active quests.',
  newest: 'No quests yet.',
  updated: 'No quests yet.',
  inactive: 'No completed quests.',
  all: 'No quests yet.',
};

/** Capitalise the first letter of every word, lower-case the rest. */
export function titleCase(text: string): string {
  return text.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_m, before: string, c: string) => before + c.toUpperCase());
}

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Split a stored description back into the details it was built from. */
export function splitDetails(description: string | null): string[] {
  if (!description) return [];
  return description
    .split(DETAIL_SEPARATOR)
    .map(d => d.trim())
    .filter(Boolean);
}

export function formatQuest(quest: Quest): string {
  const lines = [`*Quest #${quest.id}: ${titleCase(quest.title)}* _(${quest.active ? 'active' : 'completed'})_`];
  if (quest.questGiver) lines.push(`Quest giver: ${quest.questGiver}`);
  if (quest.locationGiven) lines.push(`Location: ${quest.locationGiven}`);

  const details = splitDetails(quest.description);
  if (details.length) {
    lines.push('Details:');
    for (const d of details) lines.push(`  - ${d}`);
  }

  lines.push(`Created ${formatDate(quest.created)}, last updated ${formatDate(quest.lastUpdated)}`);
  if (quest.completedDate) lines.push(`Completed ${formatDate(quest.completedDate)}`);
  return lines.join('\n');
}

export function formatQuestList(kind: QuestListKind, quests: QuestSummary[]): string {
  if (quests.length === 0) return EMPTY_LIST[kind];
  const rows = quests.map(q => {
    const notes: string[] = [];
    if (q.date) notes.push(formatDate(q.date));
    if (kind === 'all' && !q.active) notes.push('completed');
    const suffix = notes.length ? ` (${notes.join(', ')})` : '';
    return `#${q.id} ${titleCase(q.title)}${suffix}`;
  });
  return [`*${LIST_HEADINGS[kind]}*`, ...rows].join('\n');
}
