import type { Component, ComponentInput, ProducerCategory } from './types.js';
import { PRODUCER_CATEGORIES } from './types.js';
import { ResolutionError } from './errors.js';

// ─── Component registry ────────────────────────────────────────────────────

function isProducerCategory(value: string): value is ProducerCategory {
  return PRODUCER_CATEGORIES.some((category) => category === value);
}

function isNonNegative(n: number): boolean {
  return Number.isFinite(n) && n >= 0;
}

/**
 * In-memory registry of component definitions.
 *
 * Ingredients must be registered before anything that consumes them, so the
 * ingredient graph is acyclic by construction. Definitions are frozen on
 * registration and never replaced.
 */
export class Catalog {
  private readonly byName = new Map<string, Readonly<Component>>();

  get size(): number {
    return this.byName.size;
  }

  /** Validate and insert one component. Returns the stored (frozen) copy. */
  register(input: ComponentInput): Readonly<Component> {
    const { name } = input;
    if (typeof name !== 'string' || name.trim() === '') {
      throw new ResolutionError('InvalidComponent', 'Component name must be a non-empty string');
    }
    if (this.byName.has(name)) {
      throw new ResolutionError('DuplicateName', `Component "${name}" is already registered`, name);
    }

    const producer = input.producer ?? 'infinite';
    if (!isProducerCategory(producer)) {
      throw new ResolutionError('InvalidComponent', `Component "${name}" has unknown producer "${producer}"`, name);
    }

    if (input.craftSeconds !== undefined && !isNonNegative(input.craftSeconds)) {
      throw new ResolutionError(
        'InvalidComponent',
        `Component "${name}" has invalid craft time ${input.craftSeconds}`,
        name,
      );
    }

    const ingredients: [string, number][] = [];
    for (const [ingredient, qty] of Object.entries(input.ingredients ?? {})) {
      if (!this.byName.has(ingredient)) {
        throw new ResolutionError(
          'UnknownIngredient',
          `Component "${name}" uses "${ingredient}", which is not registered yet`,
          ingredient,
        );
      }
      if (!isNonNegative(qty)) {
        throw new ResolutionError(
          'InvalidComponent',
          `Component "${name}" needs an invalid quantity ${qty} of "${ingredient}"`,
          name,
        );
      }
      ingredients.push([ingredient, qty]);
    }

    const component: Readonly<Component> = Object.freeze({
      name,
      ...(input.craftSeconds !== undefined ? { craftSeconds: input.craftSeconds } : {}),
      ingredients: Object.freeze(Object.fromEntries(ingredients)),
      producer,
    });
    this.byName.set(name, component);
    return component;
  }

  /** Register in order; the first failure aborts the rest. */
  registerAll(inputs: Iterable<ComponentInput>): void {
    for (const input of inputs) this.register(input);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): Readonly<Component> {
    const component = this.byName.get(name);
    if (!component) {
      throw new ResolutionError('UnknownComponent', `Unknown component "${name}"`, name);
    }
    return component;
  }

  /** Names in registration order. */
  names(): string[] {
    return [...this.byName.keys()];
  }

  components(): IterableIterator<Readonly<Component>> {
    return this.byName.values();
  }
}

/** True when the component needs no producer: no craft time, or category `infinite`. */
export function isRaw(component: Component): boolean {
  return !component.craftSeconds || component.producer === 'infinite';
}
