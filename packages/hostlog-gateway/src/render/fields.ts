import type { EventType, Fate, Host, HostEvent, Labor, Quest } from "@hostlog/db";

export interface HostFields {
  id: number;
  hostname: string;
}

export interface EventTypeFields {
  id: number;
  category: string;
  state: string;
  description: string;
}

export interface EventFields {
  id: number;
  hostId: number;
  eventTypeId: number;
  timestamp: string;
  user: string;
  note: string | null;
}

export interface LaborFields {
  id: number;
  hostId: number;
  questId: number;
  startingEventId: number | null;
  completionEventId: number | null;
  creationTime: string;
  ackTime: string | null;
  ackUser: string | null;
  completionTime: string | null;
}

export interface QuestFields {
  id: number;
  creator: string;
  embarkTime: string;
  completionTime: string | null;
  description: string | null;
}

export interface FateFields {
  id: number;
  creationEventTypeId: number;
  completionEventTypeId: number;
  intermediate: boolean;
  description: string | null;
}

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function hostFields(host: Host): HostFields {
  return { id: host.id, hostname: host.hostname };
}

export function eventTypeFields(eventType: EventType): EventTypeFields {
  return {
    id: eventType.id,
    category: eventType.category,
    state: eventType.state,
    description: eventType.description
  };
}

export function eventFields(event: HostEvent): EventFields {
  return {
    id: event.id,
    hostId: event.host_id,
    eventTypeId: event.event_type_id,
    timestamp: event.timestamp.toISOString(),
    user: event.user,
    note: event.note
  };
}

export function laborFields(labor: Labor): LaborFields {
  return {
    id: labor.id,
    hostId: labor.host_id,
    questId: labor.quest_id,
    startingEventId: labor.starting_event_id,
    completionEventId: labor.completion_event_id,
    creationTime: labor.creation_time.toISOString(),
    ackTime: iso(labor.ack_time),
    ackUser: labor.ack_user,
    completionTime: iso(labor.completion_time)
  };
}

export function questFields(quest: Quest): QuestFields {
  return {
    id: quest.id,
    creator: quest.creator,
    embarkTime: quest.embark_time.toISOString(),
    completionTime: iso(quest.completion_time),
    description: quest.description
  };
}

export function fateFields(fate: Fate): FateFields {
  return {
    id: fate.id,
    creationEventTypeId: fate.creation_type_id,
    completionEventTypeId: fate.completion_type_id,
    intermediate: fate.intermediate,
    description: fate.description
  };
}

/** Canonical link paths under the API prefix. */
export class Links {
  constructor(readonly prefix: string) {}

  host(hostname: string) {
    return `${this.prefix}/hosts/${encodeURIComponent(hostname)}`;
  }

  eventType(id: number) {
    return `${this.prefix}/eventtypes/${id}`;
  }

  event(id: number) {
    return `${this.prefix}/events/${id}`;
  }

  labor(id: number) {
    return `${this.prefix}/labors/${id}`;
  }

  quest(id: number) {
    return `${this.prefix}/quests/${id}`;
  }

  fate(id: number) {
    return `${this.prefix}/fates/${id}`;
  }
}
