#!/usr/bin/env node
/**
 * factory-ratios: command-line front end for the resolution engine.
 * Run with: npm run dev -- <command>  (or  tsx src/ui/cli.ts <command>)
 */
import * as readline from 'node:readline/promises';
import { stdin as input, stdout as output, argv } from 'node:process';
import type { Catalog } from '../core/catalog.js';
import { isResolutionError } from '../core/errors.js';
import { CatalogLoadError, loadCatalogFromFile, loadDefaultCatalog } from '../content/loader.js';
import { parseCli, parseTargets, UsageError, type CliOptions } from './args.js';
import { runCommand, type ReportCommand } from './commands.js';

// ─── Error reporting ───────────────────────────────────────────────────────

/** Known failures print one line; anything else is a bug and is rethrown. */
function reportError(err: unknown): void {
  if (isResolutionError(err) || err instanceof CatalogLoadError || err instanceof UsageError) {
    console.error(`  ✗ ${err.message}`);
    return;
  }
  throw err;
}

// ─── Interactive mode ──────────────────────────────────────────────────────

function printMenu(catalog: Catalog, options: CliOptions): void {
  console.log('\n' + '═'.repeat(56));
  console.log(`  FACTORY RATIOS ─ ${catalog.size} components ─ preset: ${options.preset}`);
  console.log('═'.repeat(56));
  console.log('  1) Summary          2) Producers        3) Combined');
  console.log('  4) List components  5) Quit');
}

async function askCommand(rl: readline.Interface, choice: string): Promise<ReportCommand | null> {
  switch (choice) {
    case '1': {
      const component = (await rl.question('  Component > ')).trim();
      return { kind: 'summary', component };
    }
    case '2': {
      const component = (await rl.question('  Component > ')).trim();
      return { kind: 'producers', component };
    }
    case '3': {
      const entries = (await rl.question('  Targets (name=units ...) > ')).trim().split(/\s+/).filter(Boolean);
      return { kind: 'combined', targets: parseTargets(entries) };
    }
    case '4':
      return { kind: 'list' };
    default:
      return null;
  }
}

async function askWindow(rl: readline.Interface, options: CliOptions, kind: ReportCommand['kind']): Promise<CliOptions> {
  if (kind !== 'producers' && kind !== 'combined') return options;
  const units = kind === 'producers' ? (await rl.question(`  Units [${options.units}] > `)).trim() : '';
  const seconds = (await rl.question(`  Every N seconds [${options.seconds}] > `)).trim();
  return {
    ...options,
    units: units === '' ? options.units : Number(units),
    seconds: seconds === '' ? options.seconds : Number(seconds),
  };
}

async function interactive(catalog: Catalog, options: CliOptions): Promise<void> {
  const rl = readline.createInterface({ input, output });
  try {
    let running = true;
    while (running) {
      printMenu(catalog, options);
      const choice = (await rl.question('  > ')).trim();
      if (choice === '5' || choice === 'q') {
        running = false;
        continue;
      }
      try {
        const command = await askCommand(rl, choice);
        if (!command) {
          console.log('  Unknown command.');
          continue;
        }
        runCommand(catalog, command, await askWindow(rl, options, command.kind));
      } catch (err) {
        reportError(err);
      }
    }
  } finally {
    rl.close();
  }
}

// ─── Main ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  try {
    const { command, options } = parseCli(argv.slice(2));
    const catalog = options.catalogPath ? loadCatalogFromFile(options.catalogPath) : loadDefaultCatalog();

    if (command.kind === 'interactive') {
      await interactive(catalog, options);
    } else {
      runCommand(catalog, command, options);
    }
  } catch (err) {
    reportError(err);
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
