import { QuestNotFoundError } from './errors';
import type { QuestRepository } from './repository';
import { DETAIL_SEPARATOR, type NewQuest, type Quest, type QuestChanges, type QuestSummary } from './types';
import { appendDetail, validateChanges, validateNewQuest } from './validate';

/**
 * Process-local quest store with the same ordering rules as the SQL
 * queries. Used by tests and by `quests.repo: "inmem"`.
 */
export class InMemoryQuestRepository implements QuestRepository {
  private quests = new Map<number, Quest>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(input: NewQuest): Promise<Quest> {
    const valid = validateNewQuest(input);
    const ts = this.now();
    const quest: Quest = {
      id: this.nextId++,
      title: valid.title,
      description: valid.description ?? null,
      questGiver: valid.questGiver ?? null,
      locationGiven: valid.locationGiven ?? null,
      active: true,
      created: ts,
      lastUpdated: ts,
      completedDate: null,
    };
    this.quests.set(quest.id, quest);
    return { ...quest };
  }

  async modify(id: number, changes: QuestChanges): Promise<Quest> {
    const valid = validateChanges(changes);
    const quest = this.require(id);
    if (valid.title) quest.title = valid.title;
    if (valid.description) quest.description = valid.description;
    if (valid.questGiver) quest.questGiver = valid.questGiver;
    if (valid.locationGiven) quest.locationGiven = valid.locationGiven;
    quest.lastUpdated = this.now();
    return { ...quest };
  }

  async addDetail(id: number, detail: string): Promise<Quest> {
    const quest = this.require(id);
    const text = detail.trim();
    if (text) {
      quest.description = appendDetail(quest.description, text, DETAIL_SEPARATOR);
      quest.lastUpdated = this.now();
    }
    return { ...quest };
  }

  async complete(id: number): Promise<Quest> {
    const quest = this.require(id);
    const ts = this.now();
    quest.lastUpdated = ts;
    quest.completedDate = ts;
    quest.active = false;
    return { ...quest };
  }

  async listNewest(limit: number): Promise<QuestSummary[]> {
    return this.sorted((a, b) => compareDesc(a.created, b.created) || b.id - a.id)
      .slice(0, limit)
      .map(q => summary(q, q.created));
  }

  async listLastUpdated(limit: number): Promise<QuestSummary[]> {
    return this.sorted((a, b) => compareDesc(a.lastUpdated, b.lastUpdated) || b.id - a.id)
      .slice(0, limit)
      .map(q => summary(q, q.lastUpdated));
  }

  async listActive(limit: number): Promise<QuestSummary[]> {
    return this.sorted((a, b) => a.id - b.id)
      .filter(q => q.active)
      .slice(0, limit)
      .map(q => summary(q, q.created));
  }

  async listInactive(): Promise<QuestSummary[]> {
    return this.sorted(
      (a, b) => (a.completedDate?.getTime() ?? 0) - (b.completedDate?.getTime() ?? 0) || a.id - b.id,
    )
      .filter(q => !q.active)
      .map(q => summary(q, q.completedDate));
  }

  async listAll(): Promise<QuestSummary[]> {
    return this.sorted((a, b) => compareDesc(a.created, b.created) || b.id - a.id).map(q =>
      summary(q, q.created),
    );
  }

  async getById(id: number): Promise<Quest | null> {
    const quest = this.quests.get(id);
    return quest ? { ...quest } : null;
  }

  async getByTitle(title: string): Promise<Quest | null> {
    const wanted = title.trim().toLowerCase();
    const quest = this.sorted((a, b) => a.id - b.id).find(q => q.title.toLowerCase() === wanted);
    return quest ? { ...quest } : null;
  }

  private require(id: number): Quest {
    const quest = this.quests.get(id);
    if (!quest) throw new QuestNotFoundError(id);
    return quest;
  }

  private sorted(compare: (a: Quest, b: Quest) => number): Quest[] {
    return [...this.quests.values()].sort(compare);
  }
}

function compareDesc(a: Date, b: Date): number {
  return b.getTime() - a.getTime();
}

function summary(quest: Quest, date: Date | null): QuestSummary {
  return { id: quest.id, title: quest.title, date, active: quest.active };
}
