/**
 * Organizer Resolver Module
 * Makes sure every category and tag a draft references exists on the target
 * exactly once, and records its {id, name, slug}
 *
 * Fetch-or-create: always look a name up before creating it, so re-running a
 * migration reuses the organizers an earlier run made. Must complete before
 * any recipe patch, because Mealie only accepts organizers referenced by id.
 */

import { OrganizerPageSchema, OrganizerRefSchema, isSuccess } from "../types";
import type {
  MigrationContext,
  OrganizerKind,
  OrganizerNames,
  OrganizerRef,
  OrganizerTable,
} from "../types";
import { TransportError, errorMessage, slugify } from "../utils";
import { collectOrganizerNames } from "./mapper";

type ResolverContext = Pick<
  MigrationContext,
  "config" | "transport" | "tracker" | "logger" | "idGenerator"
>;

const KINDS: OrganizerKind[] = ["categories", "tags"];

// ============================================================================
// Target Calls
// ============================================================================

function toRef(data: unknown): OrganizerRef {
  const { id, name, slug } = OrganizerRefSchema.parse(data);
  return { id, name, slug };
}

/**
 * Find an organizer whose name matches exactly (search is fuzzy on the target)
 */
async function findExisting(
  kind: OrganizerKind,
  name: string,
  ctx: ResolverContext,
): Promise<OrganizerRef | null> {
  const query = new URLSearchParams({ search: name, perPage: "-1" });
  const response = await ctx.transport.invoke("GET", `/api/organizers/${kind}?${query}`);

  if (!isSuccess(response)) {
    ctx.logger.debug(`Lookup of ${kind} "${name}" returned HTTP ${response.status}`);
    return null;
  }

  const page = OrganizerPageSchema.safeParse(response.data);
  if (!page.success) return null;

  const match = page.data.items.find((item) => item.name === name);
  return match ? toRef(match) : null;
}

async function create(
  kind: OrganizerKind,
  name: string,
  ctx: ResolverContext,
): Promise<OrganizerRef | null> {
  const issuePath = `${kind}/${name}`;
  const response = await ctx.transport.invoke("POST", `/api/organizers/${kind}`, { name });

  if (isSuccess(response)) {
    return toRef(response.data);
  }

  // Created concurrently or missed by the search: fetch it by slug instead
  if (response.status === 409) {
    const slug = encodeURIComponent(slugify(name));
    const existing = await ctx.transport.invoke("GET", `/api/organizers/${kind}/slug/${slug}`);
    if (isSuccess(existing)) {
      return toRef(existing.data);
    }
    ctx.tracker.trackOrganizerIssue(issuePath, "lookup-failed", `HTTP ${existing.status}`);
    return null;
  }

  ctx.tracker.trackOrganizerIssue(issuePath, "create-rejected", `HTTP ${response.status}`);
  return null;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Resolve every name to an OrganizerRef, per kind (categories and tags are separate
 * namespaces). A name that fails is left out of the table; its recipes fail later
 * with MissingOrganizer. A TransportError aborts the run.
 */
export async function resolveOrganizers(
  names: OrganizerNames,
  ctx: ResolverContext,
): Promise<OrganizerTable> {
  const table: OrganizerTable = { categories: new Map(), tags: new Map() };
  const { dryRun } = ctx.config.migration;

  for (const kind of KINDS) {
    for (const name of names[kind]) {
      if (table[kind].has(name)) continue;

      if (dryRun) {
        table[kind].set(name, { id: ctx.idGenerator.generate(), name, slug: slugify(name) });
        continue;
      }

      try {
        const ref = (await findExisting(kind, name, ctx)) ?? (await create(kind, name, ctx));
        if (ref) {
          table[kind].set(name, ref);
          ctx.logger.debug(`Resolved ${kind} "${name}" → ${ref.slug} (${ref.id})`);
        } else {
          ctx.logger.warn(`Could not create ${kind} "${name}"`);
        }
      } catch (error) {
        if (error instanceof TransportError) throw error;
        ctx.tracker.trackError(`${kind}/${name}`, error, "organizer");
        ctx.logger.warn(`Could not resolve ${kind} "${name}": ${errorMessage(error)}`);
      }
    }
  }

  return table;
}

/**
 * Pipeline stage: resolve organizers for every draft into ctx.organizers
 */
export async function organize(ctx: MigrationContext): Promise<void> {
  if (!ctx.drafts) {
    throw new Error("Mapper must run before organizer resolver");
  }

  const names = collectOrganizerNames(ctx.drafts);
  ctx.organizers = await resolveOrganizers(names, ctx);

  ctx.logger.info(
    `${ctx.organizers.categories.size}/${names.categories.length} categories, ` +
      `${ctx.organizers.tags.size}/${names.tags.length} tags ready`,
  );
}
