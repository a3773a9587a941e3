import type { Db } from './db.js';
import type { Store } from './store.js';
import {
  createHost,
  deleteHost,
  findHostByHostname,
  findLastHostEvent,
  listHostLabors,
  listHosts,
  listLatestHostEvents,
  renameHost
} from './store.hosts.js';
import {
  createEventType,
  findEventType,
  listAssociatedFates,
  listEventTypes,
  listLatestEventTypeEvents,
  updateEventTypeDescription
} from './store.eventtypes.js';
import { createEvent, createFate, createLabor, createQuest } from './store.records.js';

/** Store backed by PostgreSQL through pg-promise. */
export function createPgStore(db: Db): Store {
  return {
    hosts: {
      findByHostname: hostname => findHostByHostname(db, hostname),
      list: (criteria, page) => listHosts(db, criteria, page),
      create: hostname => createHost(db, hostname),
      rename: (id, hostname) => renameHost(db, id, hostname),
      remove: id => deleteHost(db, id),
      laborsOf: (hostId, page) => listHostLabors(db, hostId, page),
      latestEventsOf: (hostId, page) => listLatestHostEvents(db, hostId, page),
      lastEventOf: hostId => findLastHostEvent(db, hostId)
    },
    eventTypes: {
      findById: id => findEventType(db, id),
      list: (criteria, page) => listEventTypes(db, criteria, page),
      create: input => createEventType(db, input),
      updateDescription: (id, description) => updateEventTypeDescription(db, id, description),
      latestEventsOf: (eventTypeId, page) => listLatestEventTypeEvents(db, eventTypeId, page),
      associatedFates: eventTypeId => listAssociatedFates(db, eventTypeId)
    },
    records: {
      createEvent: input => createEvent(db, input),
      createQuest: input => createQuest(db, input),
      createLabor: input => createLabor(db, input),
      createFate: input => createFate(db, input)
    },
    async ping() {
      await db.one('SELECT 1 AS ok');
    },
    async close() {
      await db.$pool.end();
    }
  };
}
