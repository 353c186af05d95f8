import { parseArgs } from 'node:util';
import type { SpeedTable } from '../core/types.js';
import type { TotalsSort } from '../core/humanize.js';
import { isSpeedPresetId, resolveSpeedTable, type SpeedPresetId } from '../content/speeds.js';

export const USAGE = `Usage: factory-ratios <command> [options]

Commands:
  list                          List every component in the catalog
  summary <name>                Total components needed for one unit
  producers <name>              Producers needed for a target rate
  combined <name=units>...      Producers needed for several targets at once
  (none)                        Interactive mode

Options:
  --catalog <file>              Catalog JSON file (default: bundled game catalog)
  --preset <base|early|mid|late>  Producer speed preset (default: base)
  --speed <category=mult>       Override one category's speed; repeatable
  --units <n>                   Units per window, producers only (default: 1)
  --seconds <s>                 Window length, producers and combined (default: 1)
  --sort <none|name|desc>       Output order (default: none)
  --raw                         Show fractional values instead of rounding up
  -h, --help                    Show this help`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'interactive' }
  | { kind: 'list' }
  | { kind: 'summary'; component: string }
  | { kind: 'producers'; component: string }
  | { kind: 'combined'; targets: Record<string, number> };

export interface CliOptions {
  catalogPath: string | null;
  preset: SpeedPresetId;
  speeds: SpeedTable;
  units: number;
  seconds: number;
  sort: TotalsSort;
  raw: boolean;
}

export interface ParsedCli {
  command: CliCommand;
  options: CliOptions;
}

const SORTS: readonly TotalsSort[] = ['none', 'name', 'desc'];

function isSort(value: string): value is TotalsSort {
  return SORTS.some((sort) => sort === value);
}

function parseNumber(flag: string, text: string | undefined, fallback: number): number {
  if (text === undefined) return fallback;
  const n = Number(text);
  if (text.trim() === '' || !Number.isFinite(n)) {
    throw new UsageError(`--${flag} expects a number, got "${text}"`);
  }
  return n;
}

/** `name=units` (or a bare `name`, meaning 1 unit). Repeated names add up. */
export function parseTargets(entries: string[]): Record<string, number> {
  if (entries.length === 0) {
    throw new UsageError('combined needs at least one name=units target');
  }
  const targets = new Map<string, number>();
  for (const entry of entries) {
    const eq = entry.lastIndexOf('=');
    const name = eq === -1 ? entry : entry.slice(0, eq);
    const units = eq === -1 ? 1 : parseNumber('units', entry.slice(eq + 1), 1);
    if (name === '') throw new UsageError(`Target "${entry}" has no component name`);
    targets.set(name, (targets.get(name) ?? 0) + units);
  }
  return Object.fromEntries(targets);
}

function requireComponent(command: string, positionals: string[]): string {
  if (positionals.length !== 1) {
    throw new UsageError(`${command} takes exactly one component name`);
  }
  return positionals[0];
}

/** `--units` only sizes `producers`; `--seconds` only `producers` and `combined`. */
function rejectUnusedWindow(command: CliCommand, hasUnits: boolean, hasSeconds: boolean): void {
  switch (command.kind) {
    case 'help':
    case 'interactive':
    case 'producers':
      return;
    case 'combined':
      if (hasUnits) throw new UsageError('combined takes units per target (name=units), not --units');
      return;
    case 'list':
    case 'summary':
      if (hasUnits || hasSeconds) throw new UsageError(`${command.kind} does not take --units or --seconds`);
      return;
  }
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      catalog: { type: 'string' },
      preset: { type: 'string' },
      speed: { type: 'string', multiple: true },
      units: { type: 'string' },
      seconds: { type: 'string' },
      sort: { type: 'string' },
      raw: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

export function parseCli(argv: string[]): ParsedCli {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
  const { values, positionals } = parsed;

  const preset = values.preset ?? 'base';
  if (!isSpeedPresetId(preset)) {
    throw new UsageError(`Unknown preset "${preset}"`);
  }
  const sort = values.sort ?? 'none';
  if (!isSort(sort)) {
    throw new UsageError(`--sort must be one of ${SORTS.join(', ')}`);
  }

  const options: CliOptions = {
    catalogPath: values.catalog ?? null,
    preset,
    speeds: resolveSpeedTable(preset, values.speed ?? []),
    units: parseNumber('units', values.units, 1),
    seconds: parseNumber('seconds', values.seconds, 1),
    sort,
    raw: values.raw ?? false,
  };

  const [name, ...rest] = positionals;
  let command: CliCommand;
  if (values.help) {
    command = { kind: 'help' };
  } else if (positionals.length === 0) {
    command = { kind: 'interactive' };
  } else if (name === 'list') {
    command = { kind: 'list' };
  } else if (name === 'summary') {
    command = { kind: 'summary', component: requireComponent(name, rest) };
  } else if (name === 'producers') {
    command = { kind: 'producers', component: requireComponent(name, rest) };
  } else if (name === 'combined') {
    command = { kind: 'combined', targets: parseTargets(rest) };
  } else {
    throw new UsageError(`Unknown command "${name}"`);
  }
  rejectUnusedWindow(command, values.units !== undefined, values.seconds !== undefined);

  return { command, options };
}
