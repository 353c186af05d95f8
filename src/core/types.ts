// ─── Shared type definitions ───────────────────────────────────────────────

export const PRODUCER_CATEGORIES = [
  'machine',
  'chem_plant',
  'furnace',
  'rocket_silo',
  'infinite',
] as const;

/** Class of building that produces a component. `infinite` = raw, never built. */
export type ProducerCategory = (typeof PRODUCER_CATEGORIES)[number];

export interface Component {
  name: string;
  /** Seconds to produce one unit. Absent or 0 = raw resource. */
  craftSeconds?: number;
  /** ingredient name -> units consumed per unit produced */
  ingredients: Record<string, number>;
  producer: ProducerCategory;
}

/** Definition accepted by `Catalog.register`; omitted fields take defaults. */
export interface ComponentInput {
  name: string;
  craftSeconds?: number;
  ingredients?: Record<string, number>;
  producer?: ProducerCategory;
}

/** Per-category throughput multipliers. Missing category = 1.0. */
export type SpeedTable = Partial<Record<ProducerCategory, number>>;

/** component name -> total units needed for one unit of the queried component */
export type ComponentTotals = Record<string, number>;

/** component name -> concurrent producers required (fractional) */
export type ProducerCounts = Record<string, number>;

/** Memoized summaries, keyed by component name. */
export type SummaryCache = Map<string, ReadonlyMap<string, number>>;

export interface SummarizeOptions {
  cache?: SummaryCache;
  /** Longest ingredient chain walked before giving up */
  maxDepth?: number;
}

export interface RateRequest extends SummarizeOptions {
  /** Units of the component to produce every `seconds` (default 1) */
  units?: number;
  /** Time window in seconds (default 1) */
  seconds?: number;
  speeds?: SpeedTable;
}
