import type { EventType, EventTypeCriteria, Host, HostCriteria, HostEvent, Store } from "@hostlog/db";
import { NotFoundError } from "../errors.js";
import type { PageView } from "./pagination.js";
import {
  eventTypeFields,
  hostFields,
  type EventFields,
  type EventTypeFields,
  type FateFields,
  type HostFields,
  type LaborFields,
  type Links,
  type QuestFields
} from "./fields.js";
import { renderRelation, type Reference } from "./representation.js";

export interface HostDocument extends HostFields {
  limit: number;
  offset: number;
  labors: (LaborFields | Reference)[];
  quests: (QuestFields | Reference)[];
  lastEvent: string | null;
  events: (EventFields | Reference)[];
}

export interface EventTypeDocument extends EventTypeFields {
  limit: number;
  offset: number;
  events: (EventFields | Reference)[];
  fate: (FateFields | Reference)[];
}

export interface HostListDocument {
  limit: number;
  offset: number;
  totalHosts: number;
  hosts: HostFields[];
}

export interface EventTypeListDocument {
  limit: number;
  offset: number;
  totalEventTypes: number;
  eventTypes: EventTypeFields[];
}

function oldestFirst(a: HostEvent, b: HostEvent): number {
  return a.timestamp.getTime() - b.timestamp.getTime() || a.id - b.id;
}

export async function requireHost(store: Store, hostname: string): Promise<Host> {
  const host = await store.hosts.findByHostname(hostname);
  if (!host) throw new NotFoundError(`No such Host ${hostname} found`);
  return host;
}

export async function requireEventType(store: Store, id: number): Promise<EventType> {
  const eventType = await store.eventTypes.findById(id);
  if (!eventType) throw new NotFoundError(`No such EventType ${id} found`);
  return eventType;
}

/**
 * Host fields plus windows over its labors (each paired with its quest) and
 * its latest events. The same offset/limit applies to both windows.
 */
export async function renderHost(
  store: Store,
  host: Host,
  view: PageView,
  links: Links
): Promise<HostDocument> {
  const page = { offset: view.offset, limit: view.limit };

  const labors = await store.hosts.laborsOf(host.id, page);
  const latest = await store.hosts.latestEventsOf(host.id, page);
  // lastEvent ignores offset/limit
  const lastEvent = await store.hosts.lastEventOf(host.id);

  return {
    ...hostFields(host),
    limit: view.limit,
    offset: view.offset,
    labors: labors.map(({ labor }) => renderRelation("labors", view.expand, labor, links)),
    quests: labors.map(({ quest }) => renderRelation("quests", view.expand, quest, links)),
    lastEvent: lastEvent ? lastEvent.timestamp.toISOString() : null,
    events: [...latest].sort(oldestFirst).map((event) => renderRelation("events", view.expand, event, links))
  };
}

/** Event type fields plus a window over its latest events and every associated fate. */
export async function renderEventType(
  store: Store,
  eventType: EventType,
  view: PageView,
  links: Links
): Promise<EventTypeDocument> {
  const page = { offset: view.offset, limit: view.limit };

  const latest = await store.eventTypes.latestEventsOf(eventType.id, page);
  const fates = await store.eventTypes.associatedFates(eventType.id);

  return {
    ...eventTypeFields(eventType),
    limit: view.limit,
    offset: view.offset,
    events: [...latest].sort(oldestFirst).map((event) => renderRelation("events", view.expand, event, links)),
    fate: fates.map((fate) => renderRelation("fates", view.expand, fate, links))
  };
}

export async function listHosts(store: Store, criteria: HostCriteria, view: PageView): Promise<HostListDocument> {
  const { rows, total } = await store.hosts.list(criteria, { offset: view.offset, limit: view.limit });
  return {
    limit: view.limit,
    offset: view.offset,
    totalHosts: total,
    hosts: rows.map(hostFields)
  };
}

export async function listEventTypes(
  store: Store,
  criteria: EventTypeCriteria,
  view: PageView
): Promise<EventTypeListDocument> {
  const { rows, total } = await store.eventTypes.list(criteria, { offset: view.offset, limit: view.limit });
  return {
    limit: view.limit,
    offset: view.offset,
    totalEventTypes: total,
    eventTypes: rows.map(eventTypeFields)
  };
}
