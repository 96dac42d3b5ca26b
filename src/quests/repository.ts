import type { NewQuest, Quest, QuestChanges, QuestListKind, QuestSummary } from './types';

/**
 * Persistence port for the quest log. Implemented by `PgQuestRepository`
 * (PostgreSQL) and `InMemoryQuestRepository`.
 *
 * Write methods throw `QuestNotFoundError` for unknown ids and
 * `QuestValidationError` for input that breaks field limits.
 *
 * @module quests/repository
 */
export interface QuestRepository {
  create(input: NewQuest): Promise<Quest>;
  /** Overwrite the non-empty fields of `changes` and touch `lastUpdated`. */
  modify(id: number, changes: QuestChanges): Promise<Quest>;
  /** Append to the description; an empty detail leaves the quest untouched. */
  addDetail(id: number, detail: string): Promise<Quest>;
  /** Mark inactive and stamp `completedDate`. */
  complete(id: number): Promise<Quest>;

  /** Most recently created first. */
  listNewest(limit: number): Promise<QuestSummary[]>;
  /** Most recently updated first. */
  listLastUpdated(limit: number): Promise<QuestSummary[]>;
  /** Active quests by id. */
  listActive(limit: number): Promise<QuestSummary[]>;
  /** Every completed quest, oldest completion first. */
  listInactive(): Promise<QuestSummary[]>;
  /** Every quest, newest first. */
  listAll(): Promise<QuestSummary[]>;

  getById(id: number): Promise<Quest | null>;
  /** Case-insensitive exact title match; the lowest id wins on duplicates. */
  getByTitle(title: string): Promise<Quest | null>;
}

/**
 * Run the list query named by `kind`. `limit` applies to the kinds that
 * take one.
 */
export function listQuests(
  repo: QuestRepository,
  kind: QuestListKind,
  limit: number,
): Promise<QuestSummary[]> {
  switch (kind) {
    case 'newest':
      return repo.listNewest(limit);
    case 'updated':
      return repo.listLastUpdated(limit);
    case 'active':
      return repo.listActive(limit);
    case 'inactive':
      return repo.listInactive();
    case 'all':
      return repo.listAll();
  }
}
