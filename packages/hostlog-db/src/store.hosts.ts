import type { Db } from './db.js';
import type { Host, HostEvent, LaborWithQuest, Labor, Page, Paged } from './types.js';
import type { HostCriteria } from './store.js';

export async function createHost(db: Db, hostname: string): Promise<Host> {
  return db.one<Host>(
    `INSERT INTO hosts(hostname) VALUES($1) RETURNING id, hostname`,
    [hostname]
  );
}

export async function findHostByHostname(db: Db, hostname: string): Promise<Host | null> {
  return db.oneOrNone<Host>(`SELECT id, hostname FROM hosts WHERE hostname = $1`, [hostname]);
}

export async function listHosts(db: Db, criteria: HostCriteria, page: Page): Promise<Paged<Host>> {
  const hostname = criteria.hostname ?? null;

  const { total } = await db.one<{ total: number }>(
    `SELECT count(*)::int AS total FROM hosts WHERE ($1::text IS NULL OR hostname = $1)`,
    [hostname]
  );
  const rows = await db.manyOrNone<Host>(
    `SELECT id, hostname FROM hosts
     WHERE ($1::text IS NULL OR hostname = $1)
     ORDER BY id ASC
     LIMIT $2 OFFSET $3`,
    [hostname, page.limit, page.offset]
  );

  return { rows, total };
}

export async function renameHost(db: Db, id: number, hostname: string): Promise<Host> {
  return db.one<Host>(
    `UPDATE hosts SET hostname = $2 WHERE id = $1 RETURNING id, hostname`,
    [id, hostname]
  );
}

export async function deleteHost(db: Db, id: number): Promise<void> {
  await db.none(`DELETE FROM hosts WHERE id = $1`, [id]);
}

interface LaborQuestRow extends Labor {
  q_creator: string;
  q_embark_time: Date;
  q_completion_time: Date | null;
  q_description: string | null;
}

export async function listHostLabors(db: Db, hostId: number, page: Page): Promise<LaborWithQuest[]> {
  const rows = await db.manyOrNone<LaborQuestRow>(
    `SELECT l.*,
            q.creator AS q_creator,
            q.embark_time AS q_embark_time,
            q.completion_time AS q_completion_time,
            q.description AS q_description
     FROM labors l
     JOIN quests q ON q.id = l.quest_id
     WHERE l.host_id = $1
     ORDER BY l.creation_time ASC, l.id ASC
     LIMIT $2 OFFSET $3`,
    [hostId, page.limit, page.offset]
  );

  return rows.map(row => ({
    labor: {
      id: row.id,
      host_id: row.host_id,
      quest_id: row.quest_id,
      starting_event_id: row.starting_event_id,
      completion_event_id: row.completion_event_id,
      creation_time: row.creation_time,
      ack_time: row.ack_time,
      ack_user: row.ack_user,
      completion_time: row.completion_time
    },
    quest: {
      id: row.quest_id,
      creator: row.q_creator,
      embark_time: row.q_embark_time,
      completion_time: row.q_completion_time,
      description: row.q_description
    }
  }));
}

export async function listLatestHostEvents(db: Db, hostId: number, page: Page): Promise<HostEvent[]> {
  return db.manyOrNone<HostEvent>(
    `SELECT * FROM events
     WHERE host_id = $1
     ORDER BY "timestamp" DESC, id DESC
     LIMIT $2 OFFSET $3`,
    [hostId, page.limit, page.offset]
  );
}

export async function findLastHostEvent(db: Db, hostId: number): Promise<HostEvent | null> {
  return db.oneOrNone<HostEvent>(
    `SELECT * FROM events
     WHERE host_id = $1
     ORDER BY "timestamp" DESC, id DESC
     LIMIT 1`,
    [hostId]
  );
}
