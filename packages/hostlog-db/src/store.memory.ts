// In-memory store for development and tests.
//
// Mirrors the constraints the SQL schema declares (unique hostname, unique
// event type category/state, foreign keys) by raising IntegrityError with the
// SQLSTATE PostgreSQL would report. Data does not persist between restarts.

import { FOREIGN_KEY_VIOLATION, IntegrityError, UNIQUE_VIOLATION } from './errors.js';
import type { Store } from './store.js';
import type { EventType, Fate, Host, HostEvent, Labor, Page, Quest } from './types.js';

/**
 * Direct access to the underlying tables, for inspection in tests.
 */
export interface MemoryTables {
  hosts: Map<number, Host>;
  eventTypes: Map<number, EventType>;
  events: Map<number, HostEvent>;
  quests: Map<number, Quest>;
  labors: Map<number, Labor>;
  fates: Map<number, Fate>;
}

export interface MemoryStore extends Store {
  _data: MemoryTables;
  clear(): void;
}

function pageOf<T>(rows: T[], page: Page): T[] {
  return rows.slice(page.offset, page.offset + page.limit);
}

function newestFirst(a: HostEvent, b: HostEvent): number {
  return b.timestamp.getTime() - a.timestamp.getTime() || b.id - a.id;
}

function missingRow(table: string, id: number): Error {
  return new Error(`No ${table} row with id ${id}`);
}

function uniqueViolation(constraint: string): IntegrityError {
  return new IntegrityError(
    UNIQUE_VIOLATION,
    constraint,
    `duplicate key value violates unique constraint "${constraint}"`
  );
}

function foreignKeyViolation(table: string, constraint: string): IntegrityError {
  return new IntegrityError(
    FOREIGN_KEY_VIOLATION,
    constraint,
    `insert or update on table "${table}" violates foreign key constraint "${constraint}"`
  );
}

function referencedViolation(table: string, constraint: string, referencing: string): IntegrityError {
  return new IntegrityError(
    FOREIGN_KEY_VIOLATION,
    constraint,
    `update or delete on table "${table}" violates foreign key constraint "${constraint}" on table "${referencing}"`
  );
}

/**
 * Create a store that keeps every table in process memory.
 *
 * @example
 * ```typescript
 * const store = createMemoryStore();
 * const host = await store.hosts.create('web-01');
 * store._data.hosts.size; // 1
 * ```
 */
export function createMemoryStore(): MemoryStore {
  const data: MemoryTables = {
    hosts: new Map(),
    eventTypes: new Map(),
    events: new Map(),
    quests: new Map(),
    labors: new Map(),
    fates: new Map()
  };
  const initialSequences = () => ({ hosts: 0, eventTypes: 0, events: 0, quests: 0, labors: 0, fates: 0 });
  let sequences = initialSequences();

  function hostnameTaken(hostname: string, exceptId?: number): boolean {
    for (const host of data.hosts.values()) {
      if (host.hostname === hostname && host.id !== exceptId) return true;
    }
    return false;
  }

  return {
    _data: data,

    clear() {
      for (const table of Object.values(data)) table.clear();
      sequences = initialSequences();
    },

    async ping() {},

    async close() {},

    hosts: {
      async findByHostname(hostname) {
        for (const host of data.hosts.values()) {
          if (host.hostname === hostname) return { ...host };
        }
        return null;
      },

      async list(criteria, page) {
        const matching = [...data.hosts.values()]
          .filter(host => criteria.hostname === undefined || host.hostname === criteria.hostname)
          .sort((a, b) => a.id - b.id);
        return { rows: pageOf(matching, page).map(host => ({ ...host })), total: matching.length };
      },

      async create(hostname) {
        if (hostnameTaken(hostname)) throw uniqueViolation('hosts_hostname_key');
        const host: Host = { id: ++sequences.hosts, hostname };
        data.hosts.set(host.id, host);
        return { ...host };
      },

      async rename(id, hostname) {
        const host = data.hosts.get(id);
        if (!host) throw missingRow('hosts', id);
        if (hostnameTaken(hostname, id)) throw uniqueViolation('hosts_hostname_key');
        host.hostname = hostname;
        return { ...host };
      },

      async remove(id) {
        for (const event of data.events.values()) {
          if (event.host_id === id) throw referencedViolation('hosts', 'events_host_id_fkey', 'events');
        }
        for (const labor of data.labors.values()) {
          if (labor.host_id === id) throw referencedViolation('hosts', 'labors_host_id_fkey', 'labors');
        }
        data.hosts.delete(id);
      },

      async laborsOf(hostId, page) {
        const labors = [...data.labors.values()]
          .filter(labor => labor.host_id === hostId)
          .sort((a, b) => a.creation_time.getTime() - b.creation_time.getTime() || a.id - b.id);

        return pageOf(labors, page).map(labor => {
          const quest = data.quests.get(labor.quest_id);
          if (!quest) throw missingRow('quests', labor.quest_id);
          return { labor: { ...labor }, quest: { ...quest } };
        });
      },

      async latestEventsOf(hostId, page) {
        const events = [...data.events.values()].filter(event => event.host_id === hostId).sort(newestFirst);
        return pageOf(events, page).map(event => ({ ...event }));
      },

      async lastEventOf(hostId) {
        const [latest] = [...data.events.values()].filter(event => event.host_id === hostId).sort(newestFirst);
        return latest ? { ...latest } : null;
      }
    },

    eventTypes: {
      async findById(id) {
        const eventType = data.eventTypes.get(id);
        return eventType ? { ...eventType } : null;
      },

      async list(criteria, page) {
        const matching = [...data.eventTypes.values()]
          .filter(
            eventType =>
              (criteria.category === undefined || eventType.category === criteria.category) &&
              (criteria.state === undefined || eventType.state === criteria.state)
          )
          .sort((a, b) => a.id - b.id);
        return { rows: pageOf(matching, page).map(eventType => ({ ...eventType })), total: matching.length };
      },

      async create(input) {
        for (const existing of data.eventTypes.values()) {
          if (existing.category === input.category && existing.state === input.state) {
            throw uniqueViolation('event_types_category_state_key');
          }
        }
        const eventType: EventType = {
          id: ++sequences.eventTypes,
          category: input.category,
          state: input.state,
          description: input.description
        };
        data.eventTypes.set(eventType.id, eventType);
        return { ...eventType };
      },

      async updateDescription(id, description) {
        const eventType = data.eventTypes.get(id);
        if (!eventType) throw missingRow('event_types', id);
        eventType.description = description;
        return { ...eventType };
      },

      async latestEventsOf(eventTypeId, page) {
        const events = [...data.events.values()]
          .filter(event => event.event_type_id === eventTypeId)
          .sort(newestFirst);
        return pageOf(events, page).map(event => ({ ...event }));
      },

      async associatedFates(eventTypeId) {
        return [...data.fates.values()]
          .filter(fate => fate.creation_type_id === eventTypeId || fate.completion_type_id === eventTypeId)
          .sort((a, b) => a.id - b.id)
          .map(fate => ({ ...fate }));
      }
    },

    records: {
      async createEvent(input) {
        if (!data.hosts.has(input.hostId)) throw foreignKeyViolation('events', 'events_host_id_fkey');
        if (!data.eventTypes.has(input.eventTypeId)) {
          throw foreignKeyViolation('events', 'events_event_type_id_fkey');
        }
        const event: HostEvent = {
          id: ++sequences.events,
          host_id: input.hostId,
          event_type_id: input.eventTypeId,
          timestamp: input.timestamp ?? new Date(),
          user: input.user ?? 'system',
          note: input.note ?? null
        };
        data.events.set(event.id, event);
        return { ...event };
      },

      async createQuest(input) {
        const quest: Quest = {
          id: ++sequences.quests,
          creator: input.creator,
          embark_time: input.embarkTime ?? new Date(),
          completion_time: null,
          description: input.description ?? null
        };
        data.quests.set(quest.id, quest);
        return { ...quest };
      },

      async createLabor(input) {
        if (!data.hosts.has(input.hostId)) throw foreignKeyViolation('labors', 'labors_host_id_fkey');
        if (!data.quests.has(input.questId)) throw foreignKeyViolation('labors', 'labors_quest_id_fkey');
        if (input.startingEventId !== undefined && !data.events.has(input.startingEventId)) {
          throw foreignKeyViolation('labors', 'labors_starting_event_id_fkey');
        }
        const labor: Labor = {
          id: ++sequences.labors,
          host_id: input.hostId,
          quest_id: input.questId,
          starting_event_id: input.startingEventId ?? null,
          completion_event_id: null,
          creation_time: input.creationTime ?? new Date(),
          ack_time: null,
          ack_user: null,
          completion_time: null
        };
        data.labors.set(labor.id, labor);
        return { ...labor };
      },

      async createFate(input) {
        if (!data.eventTypes.has(input.creationTypeId)) {
          throw foreignKeyViolation('fates', 'fates_creation_type_id_fkey');
        }
        if (!data.eventTypes.has(input.completionTypeId)) {
          throw foreignKeyViolation('fates', 'fates_completion_type_id_fkey');
        }
        const fate: Fate = {
          id: ++sequences.fates,
          creation_type_id: input.creationTypeId,
          completion_type_id: input.completionTypeId,
          intermediate: input.intermediate ?? false,
          description: input.description ?? null
        };
        data.fates.set(fate.id, fate);
        return { ...fate };
      }
    }
  };
}
