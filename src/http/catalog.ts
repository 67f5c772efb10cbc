import { readFile } from "node:fs/promises";
import { z } from "zod";

import { arrayCandidates, type Candidates } from "../core/types.js";

export const catalogEntrySchema = z.object({
  name: z.string().min(1),
  owner: z.string().min(1),
  description: z.string().default(""),
  url: z.string().url(),
  stars: z.number().int().nonnegative().default(0),
  topics: z.array(z.string()).default([]),
});

export const catalogSchema = z.array(catalogEntrySchema);

export type CatalogEntry = z.infer<typeof catalogEntrySchema>;

/** Response item built from one catalog entry. */
export interface Item {
  title: string;
  subtitle: string;
  arg: string;
  uid: string;
  valid: boolean;
}

export class CatalogError extends Error {
  readonly code = "CATALOG_INVALID";
  override readonly name = "CatalogError";
}

/** Full name of the entry, `owner/name`. */
export function repoName(entry: CatalogEntry): string {
  return `${entry.owner}/${entry.name}`;
}

export function sortKey(entry: CatalogEntry): string {
  return `${entry.owner} ${entry.name}`;
}

export function catalogCandidates(entries: readonly CatalogEntry[]): Candidates<CatalogEntry> {
  return arrayCandidates(entries, sortKey);
}

export function toItem(entry: CatalogEntry): Item {
  const repo = repoName(entry);
  return { title: repo, subtitle: entry.description, arg: entry.url, uid: repo, valid: true };
}

export function warningItem(title: string, subtitle: string): Item {
  return { title, subtitle, arg: "", uid: "", valid: false };
}

export function parseCatalog(raw: unknown, source = "catalog"): CatalogEntry[] {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = "$" + (first?.path ?? []).map((p) => (typeof p === "number" ? `[${p}]` : `.${p}`)).join("");
    throw new CatalogError(`${source}: ${where}: ${first?.message ?? "invalid"}`);
  }
  return parsed.data;
}

export async function loadCatalog(path: string): Promise<CatalogEntry[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    throw new CatalogError(`couldn't read catalog (${path})`, { cause: e });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new CatalogError(`couldn't parse catalog JSON (${path})`, { cause: e });
  }
  return parseCatalog(raw, path);
}
