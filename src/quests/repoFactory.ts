import { Pool } from 'pg';
import { ConfigError, type QuestsConfig } from '../config';
import { InMemoryQuestRepository } from './inMemoryQuestRepository';
import { PgQuestRepository } from './pgQuestRepository';
import type { QuestRepository } from './repository';

export interface QuestStore {
  repo: QuestRepository;
  /** Present when the store holds connections that must be released. */
  pool?: Pool;
  close(): Promise<void>;
}

/**
 * Build the quest repository selected by `quests.repo`.
 *
 * @throws {ConfigError} for `pg` without a connection string.
 */
export function createQuestRepository(config: QuestsConfig): QuestStore {
  if (config.repo === 'inmem') {
    return { repo: new InMemoryQuestRepository(), close: async () => undefined };
  }

  if (!config.databaseUrl) {
    throw new ConfigError('quests.repo is "pg" but no databaseUrl (or DATABASE_URL) is set');
  }
  const pool = new Pool({ connectionString: config.databaseUrl });
  return {
    repo: new PgQuestRepository(pool),
    pool,
    close: () => pool.end(),
  };
}
