import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { hostFields } from "../render/fields.js";
import { resolvePageView } from "../render/pagination.js";
import { listHosts, renderHost, requireHost } from "../render/aggregate.js";
import { createHost, deleteHost, updateHost } from "../mutations.js";
import type { RouteDeps } from "./deps.js";
import { parseListQuery } from "./query.js";

const ListQuery = z.object({
  hostname: z.string().optional()
});

interface HostParams {
  hostname: string;
}

export async function registerHosts(app: FastifyInstance, deps: RouteDeps) {
  const { store, cfg, links } = deps;
  const base = `${cfg.api.prefix}/hosts`;

  app.post(base, async (req, reply) => {
    const host = await createHost(store, req.body);
    const href = links.host(host.hostname);
    req.log.info({ hostId: host.id, hostname: host.hostname }, "host_created");

    reply.code(201).header("Location", href);
    return { ...hostFields(host), href };
  });

  app.get(base, async (req) => {
    const view = resolvePageView(req.query, cfg.pagination);
    const criteria = parseListQuery(ListQuery, req.query);
    return listHosts(store, criteria, view);
  });

  app.get<{ Params: HostParams }>(`${base}/:hostname`, async (req) => {
    const view = resolvePageView(req.query, cfg.pagination);
    const host = await requireHost(store, req.params.hostname);
    return renderHost(store, host, view, links);
  });

  app.put<{ Params: HostParams }>(`${base}/:hostname`, async (req) => {
    const host = await updateHost(store, req.params.hostname, req.body);
    req.log.info({ hostId: host.id, from: req.params.hostname, to: host.hostname }, "host_renamed");
    return { host: hostFields(host) };
  });

  app.delete<{ Params: HostParams }>(`${base}/:hostname`, async (req) => {
    const outcome = await deleteHost(store, req.params.hostname);
    req.log.info({ hostname: req.params.hostname }, "host_deleted");
    return { message: outcome.message };
  });
}
