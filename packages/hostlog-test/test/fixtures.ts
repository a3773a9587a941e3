import type { Store } from "@hostlog/db";
import { Links, type GatewayConfig, type PageView, type PaginationPolicy } from "@hostlog/gateway";

export const LINKS = new Links("/api/v1");

export const POLICY: PaginationPolicy = { defaultLimit: 10, maxLimit: 100 };

export const TEST_CONFIG: GatewayConfig = {
  http: { port: 8787 },
  api: { prefix: "/api/v1" },
  pagination: POLICY
};

export function view(overrides: Partial<PageView> = {}): PageView {
  return { offset: 0, limit: 10, expand: new Set(), ...overrides };
}

const BASE = Date.UTC(2024, 0, 1);

/** A fixed instant `minutes` after 2024-01-01T00:00:00Z. */
export function at(minutes: number): Date {
  return new Date(BASE + minutes * 60_000);
}

/**
 * web-01 (host 1) with:
 * - event type 1 system-reboot/required
 * - events 1 @10, 2 @30, 3 @20 (ids in insertion order)
 * - quests 1 and 2
 * - labors 1 @5 (quest 1), 2 @15 (quest 2), 3 @25 (quest 1)
 */
export async function seedHost(store: Store) {
  const host = await store.hosts.create("web-01");
  const reboot = await store.eventTypes.create({
    category: "system-reboot",
    state: "required",
    description: "System requires a reboot."
  });

  const events = [
    await store.records.createEvent({ hostId: host.id, eventTypeId: reboot.id, timestamp: at(10), user: "ops", note: "first" }),
    await store.records.createEvent({ hostId: host.id, eventTypeId: reboot.id, timestamp: at(30), user: "ops", note: "latest" }),
    await store.records.createEvent({ hostId: host.id, eventTypeId: reboot.id, timestamp: at(20), user: "ops", note: "middle" })
  ];

  const quests = [
    await store.records.createQuest({ creator: "ops", embarkTime: at(0), description: "Reboot fleet" }),
    await store.records.createQuest({ creator: "ops", embarkTime: at(1), description: "Patch kernel" })
  ];

  const labors = [
    await store.records.createLabor({ hostId: host.id, questId: quests[0].id, creationTime: at(5) }),
    await store.records.createLabor({ hostId: host.id, questId: quests[1].id, creationTime: at(15) }),
    await store.records.createLabor({ hostId: host.id, questId: quests[0].id, creationTime: at(25) })
  ];

  return { host, reboot, events, quests, labors };
}
