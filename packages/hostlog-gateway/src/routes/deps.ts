import type { Store } from "@hostlog/db";
import type { GatewayConfig } from "../config.js";
import type { Links } from "../render/fields.js";

export interface RouteDeps {
  store: Store;
  cfg: GatewayConfig;
  links: Links;
}
