import fs from 'fs/promises';
import type { Pool, PoolClient } from 'pg';
import { QuestNotFoundError } from './errors';
import type { QuestRepository } from './repository';
import { DETAIL_SEPARATOR, type NewQuest, type Quest, type QuestChanges, type QuestSummary } from './types';
import { appendDetail, validateChanges, validateNewQuest } from './validate';

type QuestRow = {
  id: number;
  title: string;
  description: string | null;
  quest_giver: string | null;
  location_given: string | null;
  active: boolean;
  created: Date;
  last_updated: Date;
  completed_date: Date | null;
};

type SummaryRow = {
  id: number;
  title: string;
  date: Date | null;
  active: boolean;
};

const COLUMNS = `id, title, description, quest_giver, location_given, active,
  created, last_updated, completed_date`;

const CHANGE_COLUMNS: ReadonlyArray<[keyof QuestChanges, string]> = [
  ['title', 'title'],
  ['description', 'description'],
  ['questGiver', 'quest_giver'],
  ['locationGiven', 'location_given'],
];

function toQuest(row: QuestRow): Quest {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    questGiver: row.quest_giver,
    locationGiven: row.location_given,
    active: row.active,
    created: row.created,
    lastUpdated: row.last_updated,
    completedDate: row.completed_date,
  };
}

/**
 * Quest repository over the `quests` table (see `sql/quests.sql`).
 * Timestamps come from the injected clock rather than `now()` so that
 * ordering matches the in-memory implementation.
 */
export class PgQuestRepository implements QuestRepository {
  constructor(
    private readonly pool: Pool,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async withTx<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  async create(input: NewQuest): Promise<Quest> {
    const valid = validateNewQuest(input);
    const ts = this.now();
    const r = await this.pool.query<QuestRow>(
      `INSERT INTO quests (title, description, quest_giver, location_given, active,
                           created, last_updated, completed_date)
       VALUES ($1, $2, $3, $4, TRUE, $5, $5, NULL)
       RETURNING ${COLUMNS}`,
      [valid.title, valid.description ?? null, valid.questGiver ?? null, valid.locationGiven ?? null, ts],
    );
    return toQuest(r.rows[0]);
  }

  async modify(id: number, changes: QuestChanges): Promise<Quest> {
    const valid = validateChanges(changes);
    const sets: string[] = [];
    const values: unknown[] = [id];
    for (const [key, column] of CHANGE_COLUMNS) {
      const value = valid[key];
      if (!value) continue;
      values.push(value);
      sets.push(`${column} = $${values.length}`);
    }
    values.push(this.now());
    sets.push(`last_updated = $${values.length}`);

    const r = await this.pool.query<QuestRow>(
      `UPDATE quests SET ${sets.join(', ')} WHERE id = $1 RETURNING ${COLUMNS}`,
      values,
    );
    if (r.rows.length === 0) throw new QuestNotFoundError(id);
    return toQuest(r.rows[0]);
  }

  async addDetail(id: number, detail: string): Promise<Quest> {
    return this.withTx(async client => {
      const current = await client.query<QuestRow>(
        `SELECT ${COLUMNS} FROM quests WHERE id = $1 FOR UPDATE`,
        [id],
      );
      if (current.rows.length === 0) throw new QuestNotFoundError(id);
      const text = detail.trim();
      if (!text) return toQuest(current.rows[0]);

      const description = appendDetail(current.rows[0].description, text, DETAIL_SEPARATOR);
      const r = await client.query<QuestRow>(
        `UPDATE quests SET description = $2, last_updated = $3 WHERE id = $1 RETURNING ${COLUMNS}`,
        [id, description, this.now()],
      );
      return toQuest(r.rows[0]);
    });
  }

  async complete(id: number): Promise<Quest> {
    const ts = this.now();
    const r = await this.pool.query<QuestRow>(
      `UPDATE quests
       SET active = FALSE, last_updated = $2, completed_date = $2
       WHERE id = $1
       RETURNING ${COLUMNS}`,
      [id, ts],
    );
    if (r.rows.length === 0) throw new QuestNotFoundError(id);
    return toQuest(r.rows[0]);
  }

  async listNewest(limit: number): Promise<QuestSummary[]> {
    return this.summaries(
      `SELECT id, title, created AS date, active FROM quests
       ORDER BY created DESC, id DESC LIMIT $1`,
      [limit],
    );
  }

  async listLastUpdated(limit: number): Promise<QuestSummary[]> {
    return this.summaries(
      `SELECT id, title, last_updated AS date, active FROM quests
       ORDER BY last_updated DESC, id DESC LIMIT $1`,
      [limit],
    );
  }

  async listActive(limit: number): Promise<QuestSummary[]> {
    return this.summaries(
      `SELECT id, title, created AS date, active FROM quests
       WHERE active ORDER BY id LIMIT $1`,
      [limit],
    );
  }

  async listInactive(): Promise<QuestSummary[]> {
    return this.summaries(
      `SELECT id, title, completed_date AS date, active FROM quests
       WHERE NOT active ORDER BY completed_date, id`,
      [],
    );
  }

  async listAll(): Promise<QuestSummary[]> {
    return this.summaries(
      `SELECT id, title, created AS date, active FROM quests
       ORDER BY created DESC, id DESC`,
      [],
    );
  }

  async getById(id: number): Promise<Quest | null> {
    const r = await this.pool.query<QuestRow>(`SELECT ${COLUMNS} FROM quests WHERE id = $1`, [id]);
    return r.rows.length === 0 ? null : toQuest(r.rows[0]);
  }

  async getByTitle(title: string): Promise<Quest | null> {
    const r = await this.pool.query<QuestRow>(
      `SELECT ${COLUMNS} FROM quests WHERE lower(title) = lower($1) ORDER BY id LIMIT 1`,
      [title.trim()],
    );
    return r.rows.length === 0 ? null : toQuest(r.rows[0]);
  }

  private async summaries(sql: string, values: unknown[]): Promise<QuestSummary[]> {
    const r = await this.pool.query<SummaryRow>(sql, values);
    return r.rows.map(row => ({ id: row.id, title: row.title, date: row.date, active: row.active }));
  }
}

/**
 * Apply the schema file (idempotent `CREATE ... IF NOT EXISTS` statements).
 */
export async function migrate(pool: Pool, schemaFile: string): Promise<void> {
  const sql = await fs.readFile(schemaFile, 'utf8');
  await pool.query(sql);
}
