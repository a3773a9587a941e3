export const EVENT_TYPE_STATES = ['required', 'complete'] as const;

export type EventTypeState = (typeof EVENT_TYPE_STATES)[number];

export interface Host {
  id: number;
  hostname: string;
}

export interface EventType {
  id: number;
  category: string;
  state: EventTypeState;
  description: string;
}

export interface HostEvent {
  id: number;
  host_id: number;
  event_type_id: number;
  timestamp: Date;
  user: string;
  note: string | null;
}

export interface Quest {
  id: number;
  creator: string;
  embark_time: Date;
  completion_time: Date | null;
  description: string | null;
}

export interface Labor {
  id: number;
  host_id: number;
  quest_id: number;
  starting_event_id: number | null;
  completion_event_id: number | null;
  creation_time: Date;
  ack_time: Date | null;
  ack_user: string | null;
  completion_time: Date | null;
}

export interface Fate {
  id: number;
  creation_type_id: number;
  completion_type_id: number;
  intermediate: boolean;
  description: string | null;
}

/** A labor joined to the quest that owns it. */
export interface LaborWithQuest {
  labor: Labor;
  quest: Quest;
}

export interface Page {
  offset: number;
  limit: number;
}

export interface Paged<T> {
  rows: T[];
  total: number;
}
