import type { Fate, HostEvent, Labor, Quest } from "@hostlog/db";
import {
  eventFields,
  fateFields,
  laborFields,
  questFields,
  type EventFields,
  type FateFields,
  type LaborFields,
  type Links,
  type QuestFields
} from "./fields.js";

export type Relation = "labors" | "quests" | "events" | "fates";

interface RelationEntities {
  labors: Labor;
  quests: Quest;
  events: HostEvent;
  fates: Fate;
}

interface RelationFields {
  labors: LaborFields;
  quests: QuestFields;
  events: EventFields;
  fates: FateFields;
}

export interface Reference {
  id: number;
  href: string;
}

export type Representation<F> =
  | { kind: "full"; fields: F }
  | ({ kind: "reference" } & Reference);

interface RelationRenderer<E, F> {
  fields(entity: E): F;
  href(links: Links, entity: E): string;
}

type RelationRenderers = { [R in Relation]: RelationRenderer<RelationEntities[R], RelationFields[R]> };

const renderers: RelationRenderers = {
  labors: { fields: laborFields, href: (links, labor) => links.labor(labor.id) },
  quests: { fields: questFields, href: (links, quest) => links.quest(quest.id) },
  events: { fields: eventFields, href: (links, event) => links.event(event.id) },
  fates: { fields: fateFields, href: (links, fate) => links.fate(fate.id) }
};

/**
 * Full representation when the relation is in the expand-set, otherwise a
 * reference holding only the id and canonical link.
 */
export function selectRepresentation<R extends Relation>(
  relation: R,
  expand: ReadonlySet<string>,
  entity: RelationEntities[R],
  links: Links
): Representation<RelationFields[R]> {
  const renderer: RelationRenderer<RelationEntities[R], RelationFields[R]> = renderers[relation];
  if (expand.has(relation)) {
    return { kind: "full", fields: renderer.fields(entity) };
  }
  return { kind: "reference", id: entity.id, href: renderer.href(links, entity) };
}

export function toWire<F>(representation: Representation<F>): F | Reference {
  if (representation.kind === "full") return representation.fields;
  return { id: representation.id, href: representation.href };
}

/** Selects and flattens in one step; the form the aggregator emits. */
export function renderRelation<R extends Relation>(
  relation: R,
  expand: ReadonlySet<string>,
  entity: RelationEntities[R],
  links: Links
): RelationFields[R] | Reference {
  return toWire(selectRepresentation(relation, expand, entity, links));
}
