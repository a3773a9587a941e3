import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { eventTypeFields } from "../render/fields.js";
import { resolvePageView } from "../render/pagination.js";
import { listEventTypes, renderEventType, requireEventType } from "../render/aggregate.js";
import { createEventType, deleteEventType, updateEventType } from "../mutations.js";
import { NotFoundError } from "../errors.js";
import type { RouteDeps } from "./deps.js";
import { parseListQuery } from "./query.js";

const ListQuery = z.object({
  category: z.string().optional(),
  state: z.string().optional()
});

interface EventTypeParams {
  id: string;
}

// Only digit ids address an event type; anything else is an unknown resource
function eventTypeId(raw: string): number {
  const id = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(id)) throw new NotFoundError(`No such EventType ${raw} found`);
  return id;
}

export async function registerEventTypes(app: FastifyInstance, deps: RouteDeps) {
  const { store, cfg, links } = deps;
  const base = `${cfg.api.prefix}/eventtypes`;

  app.post(base, async (req, reply) => {
    const eventType = await createEventType(store, req.body);
    const href = links.eventType(eventType.id);
    req.log.info({ eventTypeId: eventType.id, category: eventType.category }, "eventtype_created");

    reply.code(201).header("Location", href);
    return { ...eventTypeFields(eventType), href };
  });

  app.get(base, async (req) => {
    const view = resolvePageView(req.query, cfg.pagination);
    const criteria = parseListQuery(ListQuery, req.query);
    return listEventTypes(store, criteria, view);
  });

  app.get<{ Params: EventTypeParams }>(`${base}/:id`, async (req) => {
    const view = resolvePageView(req.query, cfg.pagination);
    const eventType = await requireEventType(store, eventTypeId(req.params.id));
    return renderEventType(store, eventType, view, links);
  });

  app.put<{ Params: EventTypeParams }>(`${base}/:id`, async (req) => {
    const eventType = await updateEventType(store, eventTypeId(req.params.id), req.body);
    req.log.info({ eventTypeId: eventType.id }, "eventtype_updated");
    return { eventType: eventTypeFields(eventType) };
  });

  app.delete<{ Params: EventTypeParams }>(`${base}/:id`, async (req) => {
    const outcome = deleteEventType();
    req.log.info({ eventTypeId: req.params.id }, "eventtype_delete_declined");
    return { message: outcome.message };
  });
}
