export { buildApp, type AppOptions } from "./app.js";
export { loadEnv, type Env } from "./env.js";
export { GatewayConfigSchema, configFromEnv, configHash, type GatewayConfig } from "./config.js";
export { ApiError, ValidationError, InvalidArgumentError, NotFoundError, ConflictError } from "./errors.js";
export { resolvePageView, type PageView, type PaginationPolicy } from "./render/pagination.js";
export {
  selectRepresentation,
  toWire,
  renderRelation,
  type Relation,
  type Representation,
  type Reference
} from "./render/representation.js";
export {
  renderHost,
  renderEventType,
  listHosts,
  listEventTypes,
  requireHost,
  requireEventType,
  type HostDocument,
  type EventTypeDocument,
  type HostListDocument,
  type EventTypeListDocument
} from "./render/aggregate.js";
export { Links } from "./render/fields.js";
export {
  createHost,
  updateHost,
  deleteHost,
  createEventType,
  updateEventType,
  deleteEventType,
  parseBody,
  type DeleteOutcome
} from "./mutations.js";
