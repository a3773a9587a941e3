import type {
  EventType,
  EventTypeState,
  Fate,
  Host,
  HostEvent,
  LaborWithQuest,
  Labor,
  Page,
  Paged,
  Quest
} from './types.js';

export interface HostCriteria {
  hostname?: string;
}

export interface EventTypeCriteria {
  category?: string;
  state?: string;
}

export interface CreateEventTypeInput {
  category: string;
  state: EventTypeState;
  description: string;
}

export interface CreateEventInput {
  hostId: number;
  eventTypeId: number;
  timestamp?: Date;
  user?: string;
  note?: string;
}

export interface CreateQuestInput {
  creator: string;
  embarkTime?: Date;
  description?: string;
}

export interface CreateLaborInput {
  hostId: number;
  questId: number;
  startingEventId?: number;
  creationTime?: Date;
}

export interface CreateFateInput {
  creationTypeId: number;
  completionTypeId: number;
  intermediate?: boolean;
  description?: string;
}

export interface HostStore {
  findByHostname(hostname: string): Promise<Host | null>;
  list(criteria: HostCriteria, page: Page): Promise<Paged<Host>>;
  create(hostname: string): Promise<Host>;
  rename(id: number, hostname: string): Promise<Host>;
  remove(id: number): Promise<void>;
  /** Labors of the host joined to their quest, creation time ascending. */
  laborsOf(hostId: number, page: Page): Promise<LaborWithQuest[]>;
  /** Events of the host, newest first. */
  latestEventsOf(hostId: number, page: Page): Promise<HostEvent[]>;
  lastEventOf(hostId: number): Promise<HostEvent | null>;
}

export interface EventTypeStore {
  findById(id: number): Promise<EventType | null>;
  list(criteria: EventTypeCriteria, page: Page): Promise<Paged<EventType>>;
  create(input: CreateEventTypeInput): Promise<EventType>;
  updateDescription(id: number, description: string): Promise<EventType>;
  /** Events of the event type, newest first. */
  latestEventsOf(eventTypeId: number, page: Page): Promise<HostEvent[]>;
  /** Fates whose creation or completion type is the event type, by id. */
  associatedFates(eventTypeId: number): Promise<Fate[]>;
}

/**
 * Insert-only access to the workflow records. Their state changes belong to
 * the workflow engine; these exist for seeding.
 */
export interface RecordStore {
  createEvent(input: CreateEventInput): Promise<HostEvent>;
  createQuest(input: CreateQuestInput): Promise<Quest>;
  createLabor(input: CreateLaborInput): Promise<Labor>;
  createFate(input: CreateFateInput): Promise<Fate>;
}

export interface Store {
  hosts: HostStore;
  eventTypes: EventTypeStore;
  records: RecordStore;
  /** Resolves when the backing storage answers; rejects otherwise. */
  ping(): Promise<void>;
  close(): Promise<void>;
}
