import { z } from "zod";
import { InvalidArgumentError } from "../errors.js";

export interface PaginationPolicy {
  defaultLimit: number;
  maxLimit: number;
}

/**
 * One resolved window, shared by every relation rendered in a response.
 */
export interface PageView {
  offset: number;
  limit: number;
  expand: ReadonlySet<string>;
}

const Param = z.union([z.string(), z.array(z.string())]).optional();

const PaginationQuery = z.object({
  offset: Param,
  limit: Param,
  expand: Param
});

function integerParam(field: string, raw: string | string[] | undefined): number | undefined {
  if (raw === undefined) return undefined;
  if (Array.isArray(raw)) throw new InvalidArgumentError(field, raw.join(","));
  const value = Number(raw);
  // Beyond 2^53 a digit string no longer maps to one exact number
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value)) throw new InvalidArgumentError(field, raw);
  return value;
}

function expandSet(raw: string | string[] | undefined): Set<string> {
  const values = raw === undefined ? [] : Array.isArray(raw) ? raw : [raw];
  return new Set(
    values
      .flatMap((value) => value.split(","))
      .map((name) => name.trim())
      .filter((name) => name.length > 0)
  );
}

export function resolvePageView(query: unknown, policy: PaginationPolicy): PageView {
  const parsed = PaginationQuery.safeParse(query ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidArgumentError(issue ? issue.path.join(".") : "query", "unsupported value");
  }

  const offset = integerParam("offset", parsed.data.offset) ?? 0;
  const limit = integerParam("limit", parsed.data.limit) ?? policy.defaultLimit;
  if (limit === 0) throw new InvalidArgumentError("limit", "0");

  return {
    offset,
    limit: Math.min(limit, policy.maxLimit),
    expand: expandSet(parsed.data.expand)
  };
}
