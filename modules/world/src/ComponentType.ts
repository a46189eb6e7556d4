import type { Entity } from './types.js';

let nextComponentId = 1;

/**
 * Typed key for one component slot. Each owner (usually a World) gets its own
 * sparse table, so the same type can be attached in several worlds at once.
 */
export class ComponentType<C extends object> {
  readonly id: number;
  readonly name: string;
  private readonly tables = new WeakMap<object, Map<Entity, C>>();

  constructor(name: string) {
    this.id = nextComponentId++;
    this.name = name;
  }

  table(owner: object): Map<Entity, C> {
    let table = this.tables.get(owner);
    if (!table) {
      table = new Map();
      this.tables.set(owner, table);
    }
    return table;
  }
}

export function defineComponent<C extends object>(name: string): ComponentType<C> {
  return new ComponentType<C>(name);
}
