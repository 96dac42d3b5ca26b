/**
 * Quest log domain types.
 *
 * @module quests/types
 */

export interface Quest {
  id: number;
  title: string;
  /** Details appended over time are joined with `||`. */
  description: string | null;
  questGiver: string | null;
  locationGiven: string | null;
  /** True until the quest is completed. */
  active: boolean;
  created: Date;
  lastUpdated: Date;
  completedDate: Date | null;
}

export interface NewQuest {
  title: string;
  description?: string;
  questGiver?: string;
  locationGiven?: string;
}

/** Fields that `modify` may overwrite; empty or missing values are left alone. */
export type QuestChanges = Partial<NewQuest>;

/**
 * Row shape returned by the list queries: the id, the title and the one
 * date that list is ordered by.
 */
export interface QuestSummary {
  id: number;
  title: string;
  date: Date | null;
  active: boolean;
}

export const QUEST_LIST_KINDS = ['active', 'newest', 'updated', 'inactive', 'all'] as const;

export type QuestListKind = (typeof QUEST_LIST_KINDS)[number];

/** Separator placed between details appended to a description. */
export const DETAIL_SEPARATOR = '||';
