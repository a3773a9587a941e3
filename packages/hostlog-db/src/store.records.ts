import type { Db } from './db.js';
import type { Fate, HostEvent, Labor, Quest } from './types.js';
import type { CreateEventInput, CreateFateInput, CreateLaborInput, CreateQuestInput } from './store.js';

export async function createEvent(db: Db, input: CreateEventInput): Promise<HostEvent> {
  return db.one<HostEvent>(
    `INSERT INTO events(host_id, event_type_id, "timestamp", "user", note)
     VALUES($1, $2, $3, $4, $5)
     RETURNING *`,
    [
      input.hostId,
      input.eventTypeId,
      input.timestamp ?? new Date(),
      input.user ?? 'system',
      input.note ?? null
    ]
  );
}

export async function createQuest(db: Db, input: CreateQuestInput): Promise<Quest> {
  return db.one<Quest>(
    `INSERT INTO quests(creator, embark_time, description)
     VALUES($1, $2, $3)
     RETURNING *`,
    [input.creator, input.embarkTime ?? new Date(), input.description ?? null]
  );
}

export async function createLabor(db: Db, input: CreateLaborInput): Promise<Labor> {
  return db.one<Labor>(
    `INSERT INTO labors(host_id, quest_id, starting_event_id, creation_time)
     VALUES($1, $2, $3, $4)
     RETURNING *`,
    [input.hostId, input.questId, input.startingEventId ?? null, input.creationTime ?? new Date()]
  );
}

export async function createFate(db: Db, input: CreateFateInput): Promise<Fate> {
  return db.one<Fate>(
    `INSERT INTO fates(creation_type_id, completion_type_id, intermediate, description)
     VALUES($1, $2, $3, $4)
     RETURNING *`,
    [
      input.creationTypeId,
      input.completionTypeId,
      input.intermediate ?? false,
      input.description ?? null
    ]
  );
}
