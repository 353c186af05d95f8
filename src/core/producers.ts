import type {
  Component,
  ProducerCategory,
  ProducerCounts,
  RateRequest,
  SpeedTable,
  SummaryCache,
} from './types.js';
import { PRODUCER_CATEGORIES } from './types.js';
import { isRaw, type Catalog } from './catalog.js';
import { ResolutionError } from './errors.js';
import { addTo, summarize, toRecord } from './summarize.js';
import { roundUp } from './humanize.js';

// ─── Input validation ──────────────────────────────────────────────────────

/** Throws `InvalidRate` unless every multiplier in the table is finite and > 0. */
export function validateSpeedTable(speeds: SpeedTable): void {
  for (const category of PRODUCER_CATEGORIES) {
    const multiplier = speeds[category];
    if (multiplier === undefined) continue;
    if (!Number.isFinite(multiplier) || multiplier <= 0) {
      throw new ResolutionError(
        'InvalidRate',
        `Speed multiplier for "${category}" must be a positive number, got ${multiplier}`,
        category,
      );
    }
  }
}

function validateWindow(units: number, seconds: number): void {
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ResolutionError('InvalidRate', `Time window must be a positive number of seconds, got ${seconds}`);
  }
  if (!Number.isFinite(units) || units < 0) {
    throw new ResolutionError('InvalidRate', `Target units must be a non-negative number, got ${units}`);
  }
}

export function speedMultiplier(speeds: SpeedTable, category: ProducerCategory): number {
  return speeds[category] ?? 1.0;
}

// ─── Rate conversion ───────────────────────────────────────────────────────

/** Units one producer of this component turns out per second, speed bonus included. */
export function unitsPerSecond(component: Component, speeds: SpeedTable = {}): number {
  if (isRaw(component) || component.craftSeconds === undefined) {
    throw new ResolutionError(
      'InvalidComponent',
      `Component "${component.name}" is a raw resource and has no production rate`,
      component.name,
    );
  }
  const rate = (1 / component.craftSeconds) * speedMultiplier(speeds, component.producer);
  if (!Number.isFinite(rate) || rate <= 0) {
    throw new ResolutionError(
      'InvalidRate',
      `Production rate of "${component.name}" is not a positive finite number (${rate})`,
      component.name,
    );
  }
  return rate;
}

/**
 * Concurrent producers needed, per component in the chain, to turn out
 * `units` of `name` every `seconds`. Counts are fractional; raw resources are
 * left out.
 */
export function producersNeeded(
  catalog: Catalog,
  name: string,
  request: RateRequest = {},
): ProducerCounts {
  const { units = 1, seconds = 1, speeds = {} } = request;
  validateWindow(units, seconds);
  validateSpeedTable(speeds);

  const targetRate = units / seconds;
  const totals = summarize(catalog, name, request);

  const producers = new Map<string, number>();
  for (const [componentName, quantity] of Object.entries(totals)) {
    const component = catalog.get(componentName);
    if (isRaw(component)) continue;

    const count = (quantity * targetRate) / unitsPerSecond(component, speeds);
    if (!Number.isFinite(count)) {
      throw new ResolutionError(
        'InvalidRate',
        `Producers for "${componentName}" overflow at ${units} every ${seconds}s`,
        componentName,
      );
    }
    producers.set(componentName, count);
  }
  return toRecord(producers);
}

/**
 * Producers for a whole bill of materials: `targets` maps component name to
 * units wanted every `seconds`. Per-target results are summed by name.
 */
export function combinedProducersNeeded(
  catalog: Catalog,
  targets: Record<string, number>,
  seconds: number,
  speeds: SpeedTable = {},
): ProducerCounts {
  const entries = Object.entries(targets);
  // Reject the whole request before computing anything
  for (const [name, units] of entries) {
    catalog.get(name);
    validateWindow(units, seconds);
  }
  validateSpeedTable(speeds);

  const cache: SummaryCache = new Map();
  const combined = new Map<string, number>();
  for (const [name, units] of entries) {
    const producers = producersNeeded(catalog, name, { units, seconds, speeds, cache });
    for (const [producerName, count] of Object.entries(producers)) {
      addTo(combined, producerName, count);
    }
  }
  return toRecord(combined);
}

/**
 * Whole buildings per producer category. Each component's count is rounded
 * up on its own, since a production line can't share a fractional producer.
 */
export function producersByCategory(
  catalog: Catalog,
  counts: ProducerCounts,
): Partial<Record<ProducerCategory, number>> {
  const byCategory: Partial<Record<ProducerCategory, number>> = {};
  for (const [name, count] of Object.entries(counts)) {
    const { producer } = catalog.get(name);
    byCategory[producer] = (byCategory[producer] ?? 0) + roundUp(count);
  }
  return byCategory;
}
