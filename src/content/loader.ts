import { readFileSync } from 'node:fs';
import { z } from 'zod/v4';
import type { ComponentInput } from '../core/types.js';
import { PRODUCER_CATEGORIES } from '../core/types.js';
import { Catalog } from '../core/catalog.js';

const BUNDLED_CATALOG_URL = new URL('./components.json', import.meta.url);

// ─── File schema ───────────────────────────────────────────────────────────

/**
 * One recipe as written in a catalog file. `seconds` and `ingredients`
 * describe a single craft, which turns out `yield` units.
 */
export const ComponentRecordSchema = z.object({
  name: z.string().min(1),
  seconds: z.number().nonnegative().optional(),
  yield: z.number().positive().optional(),
  ingredients: z.record(z.string(), z.number().nonnegative()).optional(),
  producer: z.enum(PRODUCER_CATEGORIES).optional(),
});
export type ComponentRecord = z.infer<typeof ComponentRecordSchema>;

export const CatalogFileSchema = z.object({
  components: z.array(ComponentRecordSchema),
});

export class CatalogLoadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CatalogLoadError';
  }
}

// ─── Parsing ───────────────────────────────────────────────────────────────

export function parseCatalog(data: unknown): ComponentRecord[] {
  const result = CatalogFileSchema.safeParse(data);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new CatalogLoadError(`Invalid catalog: ${details}`);
  }
  return result.data.components;
}

/** Scale one craft down to the per-unit definition the catalog stores. */
export function toComponent(record: ComponentRecord): ComponentInput {
  const perCraft = record.yield ?? 1;
  // fromEntries defines own keys, so any component name survives
  const ingredients = Object.fromEntries(
    Object.entries(record.ingredients ?? {}).map(([name, qty]) => [name, qty / perCraft]),
  );
  return {
    name: record.name,
    ...(record.seconds !== undefined ? { craftSeconds: record.seconds / perCraft } : {}),
    ingredients,
    producer: record.producer ?? 'infinite',
  };
}

/** Register records in file order. Registration errors propagate unchanged. */
export function buildCatalog(records: ComponentRecord[]): Catalog {
  const catalog = new Catalog();
  catalog.registerAll(records.map(toComponent));
  return catalog;
}

// ─── Sources ───────────────────────────────────────────────────────────────

export function loadCatalogFromString(json: string): Catalog {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw new CatalogLoadError(`Catalog is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return buildCatalog(parseCatalog(data));
}

export function loadCatalogFromFile(path: string | URL): Catalog {
  let json: string;
  try {
    json = readFileSync(path, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CatalogLoadError(`Cannot read catalog file ${String(path)}: ${reason}`, { cause: err });
  }
  return loadCatalogFromString(json);
}

/** The game catalog shipped with the package. */
export function loadDefaultCatalog(): Catalog {
  return loadCatalogFromFile(BUNDLED_CATALOG_URL);
}
