import { z } from "zod";
import { EVENT_TYPE_STATES, integrityViolation } from "@hostlog/db";
import type { EventType, Host, Store } from "@hostlog/db";
import { ConflictError, ValidationError } from "./errors.js";
import { requireEventType, requireHost } from "./render/aggregate.js";

export type DeleteOutcome =
  | { kind: "deleted"; message: string }
  // Declined: answered as a success carrying a message, never an error
  | { kind: "declined"; message: string };

const HostBody = z.object({
  hostname: z.string().min(1, "hostname must not be empty")
});

const CreateEventTypeBody = z.object({
  category: z.string().min(1, "category must not be empty"),
  state: z.enum(EVENT_TYPE_STATES),
  description: z.string()
});

const UpdateEventTypeBody = z.object({
  description: z.string()
});

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  if (body !== undefined && body !== null && (typeof body !== "object" || Array.isArray(body))) {
    throw new ValidationError("Request body must be a JSON object");
  }

  const parsed = schema.safeParse(body ?? {});
  if (parsed.success) return parsed.data;

  const [issue] = parsed.error.issues;
  if (!issue) throw new ValidationError("Invalid request body");
  const field = issue.path.join(".");
  if (issue.code === "invalid_type" && issue.received === "undefined") {
    throw ValidationError.missing(field);
  }
  if (issue.code === "invalid_enum_value") {
    throw new ValidationError(`Invalid ${field}: expected one of ${issue.options.join(", ")}`, { field });
  }
  throw new ValidationError(`Invalid ${field}: ${issue.message}`, { field });
}

/** Runs a store write, turning integrity violations into conflicts. */
async function write<T>(op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    const violation = integrityViolation(err);
    if (violation) throw new ConflictError(violation.message, violation.code);
    throw err;
  }
}

export async function createHost(store: Store, body: unknown): Promise<Host> {
  const { hostname } = parseBody(HostBody, body);
  return write(() => store.hosts.create(hostname));
}

export async function updateHost(store: Store, hostname: string, body: unknown): Promise<Host> {
  const host = await requireHost(store, hostname);
  const input = parseBody(HostBody, body);
  return write(() => store.hosts.rename(host.id, input.hostname));
}

export async function deleteHost(store: Store, hostname: string): Promise<DeleteOutcome> {
  const host = await requireHost(store, hostname);
  await write(() => store.hosts.remove(host.id));
  return { kind: "deleted", message: `Host ${hostname} deleted.` };
}

export async function createEventType(store: Store, body: unknown): Promise<EventType> {
  const input = parseBody(CreateEventTypeBody, body);
  return write(() => store.eventTypes.create(input));
}

// Only the description is mutable; category and state in the body are ignored
export async function updateEventType(store: Store, id: number, body: unknown): Promise<EventType> {
  const eventType = await requireEventType(store, id);
  const { description } = parseBody(UpdateEventTypeBody, body);
  return write(() => store.eventTypes.updateDescription(eventType.id, description));
}

export function deleteEventType(): DeleteOutcome {
  return { kind: "declined", message: "Not supported." };
}
