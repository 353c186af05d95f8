#!/usr/bin/env tsx
/**
 * factory-ratios — Smoke Test
 *
 * Resolves every component of the bundled catalog and checks:
 * - each summary contains the component itself at quantity 1
 * - raw resources never show up as producers
 * - a combined request equals the sum of its parts
 * - speed presets scale producer counts
 *
 * Run with: npm run smoke
 */
import type { SummaryCache } from '../src/core/types.js';
import { isRaw } from '../src/core/catalog.js';
import { summarize } from '../src/core/summarize.js';
import { combinedProducersNeeded, producersByCategory, producersNeeded } from '../src/core/producers.js';
import { humanize } from '../src/core/humanize.js';
import { loadDefaultCatalog } from '../src/content/loader.js';
import { SPEED_PRESETS } from '../src/content/speeds.js';

// ─── Helpers ───────────────────────────────────────────────────────────────

const failures: string[] = [];

function check(ok: boolean, msg: string): void {
  if (!ok) failures.push(msg);
}

function info(msg: string): void {
  console.log(`  ${msg}`);
}

function close(a: number, b: number): boolean {
  return Math.abs(a - b) <= 1e-9 * Math.max(1, Math.abs(a), Math.abs(b));
}

// ─── Main smoke run ────────────────────────────────────────────────────────

function runSmoke(): void {
  console.log('╔══════════════════════════════════════════════════════╗');
  console.log('║   FACTORY RATIOS — SMOKE TEST                        ║');
  console.log('╚══════════════════════════════════════════════════════╝\n');

  const catalog = loadDefaultCatalog();
  info(`Loaded ${catalog.size} components`);

  // Every component resolves; one shared cache
  const cache: SummaryCache = new Map();
  for (const name of catalog.names()) {
    const totals = summarize(catalog, name, { cache });
    check(totals[name] === 1, `${name}: summary lacks itself at 1`);
    for (const [sub, qty] of Object.entries(totals)) {
      check(qty > 0, `${name}: non-positive total for ${sub}`);
    }

    const producers = producersNeeded(catalog, name, { cache });
    for (const producerName of Object.keys(producers)) {
      check(!isRaw(catalog.get(producerName)), `${name}: raw ${producerName} listed as producer`);
    }
  }
  info(`Resolved ${cache.size} summaries`);

  // Science pack bill of materials, one pack of each per 10s
  const science = { red_sci: 1, green_sci: 1, black_sci: 1, blue_sci: 1, pink_sci: 1, yellow_sci: 1 };
  const combined = combinedProducersNeeded(catalog, science, 10);
  const summed: Record<string, number> = {};
  for (const [name, units] of Object.entries(science)) {
    for (const [p, n] of Object.entries(producersNeeded(catalog, name, { units, seconds: 10 }))) {
      summed[p] = (summed[p] ?? 0) + n;
    }
  }
  check(Object.keys(combined).length === Object.keys(summed).length, 'combined: key count differs from sum');
  for (const [p, n] of Object.entries(summed)) {
    check(close(combined[p] ?? NaN, n), `combined: ${p} is ${combined[p]}, expected ${n}`);
  }

  // Faster machines never need more producers
  const base = producersNeeded(catalog, 'rocket', { seconds: 60 });
  const late = producersNeeded(catalog, 'rocket', { seconds: 60, speeds: SPEED_PRESETS.late.speeds });
  for (const [p, n] of Object.entries(late)) {
    check(n <= (base[p] ?? NaN), `late preset: ${p} needs more producers than base`);
  }

  console.log('\n  Science, 1 of each per 10s (late preset):');
  humanize(
    combinedProducersNeeded(catalog, science, 10, SPEED_PRESETS.late.speeds),
    (line) => info(`  ${line}`),
    { sort: 'desc' },
  );
  info(`By category: ${JSON.stringify(producersByCategory(catalog, combined))}`);

  console.log('\n' + '═'.repeat(56));
  if (failures.length > 0) {
    for (const f of failures) console.error(`  ✗ ${f}`);
    console.error(`\n  ✗ SMOKE FAIL: ${failures.length} check(s) failed`);
    process.exit(1);
  }
  console.log('  ✓ All checks passed. Smoke test PASSED.');
}

runSmoke();
