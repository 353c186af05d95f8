import { describe, it, expect } from 'vitest';
import { Catalog } from '../src/core/catalog.js';
import { ResolutionError } from '../src/core/errors.js';
import {
  combinedProducersNeeded,
  producersByCategory,
  producersNeeded,
  unitsPerSecond,
  validateSpeedTable,
} from '../src/core/producers.js';

function errorCode(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (err) {
    return err instanceof ResolutionError ? err.code : 'not a ResolutionError';
  }
}

/** iron, copper raw; cable (2 per 0.5s), board, gear, steel in a furnace */
function electronics(): Catalog {
  const catalog = new Catalog();
  catalog.registerAll([
    { name: 'iron' },
    { name: 'copper' },
    { name: 'cable', craftSeconds: 0.25, ingredients: { copper: 0.5 }, producer: 'machine' },
    { name: 'board', craftSeconds: 0.5, ingredients: { iron: 1, cable: 3 }, producer: 'machine' },
    { name: 'gear', craftSeconds: 0.5, ingredients: { iron: 2 }, producer: 'machine' },
    { name: 'steel', craftSeconds: 8, ingredients: { iron: 5 }, producer: 'furnace' },
    { name: 'frame', craftSeconds: 4, ingredients: { steel: 1, board: 2 }, producer: 'machine' },
  ]);
  return catalog;
}

describe('producersNeeded', () => {
  it('a 2-second recipe needs 2 producers for 1 unit per second', () => {
    const catalog = new Catalog();
    catalog.register({ name: 'widget', craftSeconds: 2, producer: 'machine' });
    expect(producersNeeded(catalog, 'widget')).toEqual({ widget: 2 });
  });

  it('a speed multiplier of 2 halves the count', () => {
    const catalog = new Catalog();
    catalog.register({ name: 'widget', craftSeconds: 2, producer: 'machine' });
    expect(producersNeeded(catalog, 'widget', { speeds: { machine: 2 } })).toEqual({ widget: 1 });
  });

  it('scales with units over seconds', () => {
    const catalog = new Catalog();
    catalog.register({ name: 'widget', craftSeconds: 2, producer: 'machine' });
    // 3 every 6s = 0.5/s, each producer makes 0.5/s
    expect(producersNeeded(catalog, 'widget', { units: 3, seconds: 6 })).toEqual({ widget: 1 });
    expect(producersNeeded(catalog, 'widget', { units: 0 })).toEqual({ widget: 0 });
  });

  it('multiplies nested requirements and skips raw resources', () => {
    const counts = producersNeeded(electronics(), 'board');
    // board: 1/s at 2/s each; cable: 3/s at 4/s each
    expect(counts).toEqual({ board: 0.5, cable: 0.75 });
    expect(counts).not.toHaveProperty('iron');
    expect(counts).not.toHaveProperty('copper');
  });

  it('applies each multiplier only to its own category', () => {
    const counts = producersNeeded(electronics(), 'frame', { units: 1, seconds: 4, speeds: { furnace: 2 } });
    // 0.25 frame/s: frame 1, steel 0.25*8/2 = 1, board 0.5*0.5 = 0.25, cable 1.5*0.25 = 0.375
    expect(counts.frame).toBeCloseTo(1);
    expect(counts.steel).toBeCloseTo(1);
    expect(counts.board).toBeCloseTo(0.25);
    expect(counts.cable).toBeCloseTo(0.375);
    expect(Object.keys(counts).sort()).toEqual(['board', 'cable', 'frame', 'steel']);
  });

  it('never lists a component without craft time or in the infinite category', () => {
    const catalog = new Catalog();
    catalog.registerAll([
      { name: 'ore' },
      { name: 'instant', craftSeconds: 0, ingredients: { ore: 1 }, producer: 'machine' },
      { name: 'pump', craftSeconds: 1, producer: 'infinite' },
      { name: 'plate', craftSeconds: 1, ingredients: { instant: 4, pump: 2 }, producer: 'furnace' },
    ]);
    expect(producersNeeded(catalog, 'plate')).toEqual({ plate: 1 });
  });

  it('rejects a non-positive or non-finite window', () => {
    const catalog = electronics();
    expect(errorCode(() => producersNeeded(catalog, 'gear', { seconds: 0 }))).toBe('InvalidRate');
    expect(errorCode(() => producersNeeded(catalog, 'gear', { seconds: -5 }))).toBe('InvalidRate');
    expect(errorCode(() => producersNeeded(catalog, 'gear', { seconds: Number.NaN }))).toBe('InvalidRate');
    expect(errorCode(() => producersNeeded(catalog, 'gear', { units: -1 }))).toBe('InvalidRate');
  });

  it('rejects a speed multiplier that is not positive', () => {
    const catalog = electronics();
    expect(errorCode(() => producersNeeded(catalog, 'gear', { speeds: { machine: 0 } }))).toBe('InvalidRate');
    expect(errorCode(() => producersNeeded(catalog, 'gear', { speeds: { furnace: -1 } }))).toBe('InvalidRate');
    expect(errorCode(() => producersNeeded(catalog, 'gear', { speeds: { machine: Infinity } }))).toBe('InvalidRate');
  });

  it('throws UnknownComponent for a missing name', () => {
    expect(errorCode(() => producersNeeded(electronics(), 'rocket'))).toBe('UnknownComponent');
  });
});

describe('producersNeeded with unusual input', () => {
  it('counts a component named __proto__', () => {
    const catalog = new Catalog();
    catalog.register({ name: '__proto__', craftSeconds: 2, producer: 'machine' });
    catalog.register({ name: 'top', ingredients: Object.fromEntries([['__proto__', 3]]) });
    expect(Object.entries(producersNeeded(catalog, '__proto__'))).toEqual([['__proto__', 2]]);
    expect(Object.entries(producersNeeded(catalog, 'top'))).toEqual([['__proto__', 6]]);
  });

  it('rejects a production rate that underflows to zero', () => {
    const catalog = new Catalog();
    catalog.register({ name: 'slow', craftSeconds: 1e300, producer: 'machine' });
    expect(errorCode(() => producersNeeded(catalog, 'slow', { speeds: { machine: 1e-30 } }))).toBe('InvalidRate');
  });

  it('rejects a count that overflows to infinity', () => {
    const catalog = new Catalog();
    catalog.register({ name: 'widget', craftSeconds: 2, producer: 'machine' });
    expect(errorCode(() => producersNeeded(catalog, 'widget', { units: 1e300, seconds: 1e-300 }))).toBe('InvalidRate');
  });
});

describe('validateSpeedTable', () => {
  it('names the offending category', () => {
    try {
      validateSpeedTable({ machine: 1, chem_plant: 0 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ResolutionError);
      expect(err).toMatchObject({ code: 'InvalidRate', subject: 'chem_plant' });
    }
  });

  it('accepts an empty table', () => {
    expect(() => validateSpeedTable({})).not.toThrow();
  });
});

describe('unitsPerSecond', () => {
  it('inverts the craft time and applies the category multiplier', () => {
    const catalog = electronics();
    expect(unitsPerSecond(catalog.get('gear'))).toBe(2);
    expect(unitsPerSecond(catalog.get('steel'), { furnace: 2, machine: 10 })).toBe(0.25);
  });

  it('refuses raw components', () => {
    expect(errorCode(() => unitsPerSecond(electronics().get('iron')))).toBe('InvalidComponent');
  });

  it('refuses a rate too large to represent', () => {
    const catalog = new Catalog();
    const instant = catalog.register({ name: 'instant', craftSeconds: 1e-320, producer: 'machine' });
    expect(errorCode(() => unitsPerSecond(instant))).toBe('InvalidRate');
  });
});

describe('combinedProducersNeeded', () => {
  it('equals the element-wise sum of the separate queries', () => {
    const catalog = electronics();
    const targets = { board: 2, frame: 1 };
    const combined = combinedProducersNeeded(catalog, targets, 10, { machine: 0.75 });

    const board = producersNeeded(catalog, 'board', { units: 2, seconds: 10, speeds: { machine: 0.75 } });
    const frame = producersNeeded(catalog, 'frame', { units: 1, seconds: 10, speeds: { machine: 0.75 } });

    expect(Object.keys(combined).sort()).toEqual(['board', 'cable', 'frame', 'steel']);
    for (const name of Object.keys(combined)) {
      expect(combined[name]).toBeCloseTo((board[name] ?? 0) + (frame[name] ?? 0));
    }
  });

  it('checks every target before computing anything', () => {
    const catalog = electronics();
    expect(errorCode(() => combinedProducersNeeded(catalog, { gear: 1, ghost: 1 }, 1))).toBe('UnknownComponent');
    expect(errorCode(() => combinedProducersNeeded(catalog, { gear: 1, board: -2 }, 1))).toBe('InvalidRate');
    expect(errorCode(() => combinedProducersNeeded(catalog, { gear: 1 }, 0))).toBe('InvalidRate');
  });

  it('returns an empty result for no targets', () => {
    expect(combinedProducersNeeded(electronics(), {}, 1)).toEqual({});
  });
});

describe('producersByCategory', () => {
  it('rounds each component up before summing per category', () => {
    const catalog = electronics();
    expect(producersByCategory(catalog, { board: 0.5, cable: 0.75, steel: 1.01 })).toEqual({
      machine: 2,
      furnace: 2,
    });
  });
});
