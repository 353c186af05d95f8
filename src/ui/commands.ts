import type { Component, ProducerCounts } from '../core/types.js';
import { PRODUCER_CATEGORIES } from '../core/types.js';
import { isRaw, type Catalog } from '../core/catalog.js';
import { summarize } from '../core/summarize.js';
import { combinedProducersNeeded, producersByCategory, producersNeeded } from '../core/producers.js';
import { formatTotals } from '../core/humanize.js';
import type { CliCommand, CliOptions } from './args.js';
import { USAGE } from './args.js';

export type Print = (line: string) => void;

/** Everything except interactive mode, which needs a terminal. */
export type ReportCommand = Exclude<CliCommand, { kind: 'interactive' }>;

// ─── Report helpers ────────────────────────────────────────────────────────

function fmt(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(3).replace(/\.?0+$/, '');
}

export function describeComponent(component: Component): string {
  if (isRaw(component)) return `${component.name} : raw`;
  return `${component.name} : ${fmt(component.craftSeconds ?? 0)}s (${component.producer})`;
}

function printProducerReport(catalog: Catalog, counts: ProducerCounts, options: CliOptions, print: Print): void {
  for (const line of formatTotals(counts, options)) print(`  ${line}`);

  const byCategory = producersByCategory(catalog, counts);
  print('By category:');
  for (const category of PRODUCER_CATEGORIES) {
    const total = byCategory[category];
    if (total !== undefined) print(`  ${category} : ${total}`);
  }
}

// ─── Command dispatch ──────────────────────────────────────────────────────

/** Runs one non-interactive command, writing its report through `print`. */
export function runCommand(catalog: Catalog, command: ReportCommand, options: CliOptions, print: Print = console.log): void {
  switch (command.kind) {
    case 'help':
      print(USAGE);
      return;
    case 'list':
      for (const component of catalog.components()) print(describeComponent(component));
      return;
    case 'summary': {
      const totals = summarize(catalog, command.component);
      print(`Components for 1 × ${command.component}:`);
      for (const line of formatTotals(totals, options)) print(`  ${line}`);
      return;
    }
    case 'producers': {
      const counts = producersNeeded(catalog, command.component, {
        units: options.units,
        seconds: options.seconds,
        speeds: options.speeds,
      });
      print(`Producers for ${fmt(options.units)} × ${command.component} every ${fmt(options.seconds)}s:`);
      printProducerReport(catalog, counts, options, print);
      return;
    }
    case 'combined': {
      const counts = combinedProducersNeeded(catalog, command.targets, options.seconds, options.speeds);
      const label = Object.entries(command.targets)
        .map(([name, units]) => `${fmt(units)} × ${name}`)
        .join(', ');
      print(`Producers for ${label} every ${fmt(options.seconds)}s:`);
      printProducerReport(catalog, counts, options, print);
      return;
    }
  }
}
