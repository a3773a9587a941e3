import type { Db } from './db.js';
import type { EventType, Fate, HostEvent, Page, Paged } from './types.js';
import type { CreateEventTypeInput, EventTypeCriteria } from './store.js';

export async function createEventType(db: Db, input: CreateEventTypeInput): Promise<EventType> {
  return db.one<EventType>(
    `INSERT INTO event_types(category, state, description)
     VALUES($1, $2, $3)
     RETURNING *`,
    [input.category, input.state, input.description]
  );
}

export async function findEventType(db: Db, id: number): Promise<EventType | null> {
  return db.oneOrNone<EventType>(`SELECT * FROM event_types WHERE id = $1`, [id]);
}

export async function listEventTypes(
  db: Db,
  criteria: EventTypeCriteria,
  page: Page
): Promise<Paged<EventType>> {
  const filter = `($1::text IS NULL OR category = $1) AND ($2::text IS NULL OR state = $2)`;
  const category = criteria.category ?? null;
  const state = criteria.state ?? null;

  const { total } = await db.one<{ total: number }>(
    `SELECT count(*)::int AS total FROM event_types WHERE ${filter}`,
    [category, state]
  );
  const rows = await db.manyOrNone<EventType>(
    `SELECT * FROM event_types WHERE ${filter}
     ORDER BY id ASC
     LIMIT $3 OFFSET $4`,
    [category, state, page.limit, page.offset]
  );

  return { rows, total };
}

// Category and state are fixed at creation
export async function updateEventTypeDescription(
  db: Db,
  id: number,
  description: string
): Promise<EventType> {
  return db.one<EventType>(
    `UPDATE event_types SET description = $2 WHERE id = $1 RETURNING *`,
    [id, description]
  );
}

export async function listLatestEventTypeEvents(
  db: Db,
  eventTypeId: number,
  page: Page
): Promise<HostEvent[]> {
  return db.manyOrNone<HostEvent>(
    `SELECT * FROM events
     WHERE event_type_id = $1
     ORDER BY "timestamp" DESC, id DESC
     LIMIT $2 OFFSET $3`,
    [eventTypeId, page.limit, page.offset]
  );
}

export async function listAssociatedFates(db: Db, eventTypeId: number): Promise<Fate[]> {
  return db.manyOrNone<Fate>(
    `SELECT * FROM fates
     WHERE creation_type_id = $1 OR completion_type_id = $1
     ORDER BY id ASC`,
    [eventTypeId]
  );
}
