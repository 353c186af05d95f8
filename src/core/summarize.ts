import type { Component, ComponentTotals, SummarizeOptions, SummaryCache } from './types.js';
import type { Catalog } from './catalog.js';
import { ResolutionError } from './errors.js';

export const DEFAULT_MAX_DEPTH = 256;

// ─── Accumulation helpers ──────────────────────────────────────────────────

export function addTo(totals: Map<string, number>, name: string, amount: number): void {
  totals.set(name, (totals.get(name) ?? 0) + amount);
}

export function toRecord(totals: ReadonlyMap<string, number>): Record<string, number> {
  return Object.fromEntries(totals);
}

// ─── Transitive ingredient totals ──────────────────────────────────────────

interface Frame {
  component: Readonly<Component>;
  ingredients: [string, number][];
  /** Index of the next ingredient to visit */
  next: number;
}

function frameFor(component: Readonly<Component>): Frame {
  return {
    component,
    // zero-quantity ingredients contribute nothing
    ingredients: Object.entries(component.ingredients).filter(([, qty]) => qty > 0),
    next: 0,
  };
}

/**
 * Totals for one unit of `name`: the component itself at 1, plus every
 * ingredient reachable from it multiplied through each path.
 *
 * Walks the graph depth-first with an explicit stack. Each finished
 * component's totals go into `options.cache`, so a cache shared between calls
 * resolves every component at most once.
 */
export function summarize(
  catalog: Catalog,
  name: string,
  options: SummarizeOptions = {},
): ComponentTotals {
  const cache: SummaryCache = options.cache ?? new Map();
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

  const root = catalog.get(name);
  const stack: Frame[] = cache.has(root.name) ? [] : [frameFor(root)];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];

    if (frame.next < frame.ingredients.length) {
      const [ingredient] = frame.ingredients[frame.next];
      frame.next++;
      if (cache.has(ingredient)) continue;
      if (stack.length >= maxDepth) {
        throw new ResolutionError(
          'DepthLimitExceeded',
          `Ingredient chain of "${name}" is deeper than ${maxDepth} levels`,
          name,
        );
      }
      stack.push(frameFor(catalog.get(ingredient)));
      continue;
    }

    // Every ingredient is resolved; fold them into this component's totals
    const totals = new Map<string, number>([[frame.component.name, 1]]);
    for (const [ingredient, qty] of frame.ingredients) {
      for (const [subName, subQty] of cachedTotals(cache, ingredient)) {
        addTo(totals, subName, qty * subQty);
      }
    }
    cache.set(frame.component.name, totals);
    stack.pop();
  }

  return toRecord(cachedTotals(cache, root.name));
}

function cachedTotals(cache: SummaryCache, name: string): ReadonlyMap<string, number> {
  const totals = cache.get(name);
  if (!totals) {
    throw new Error(`Summary for "${name}" was not resolved before use`);
  }
  return totals;
}
