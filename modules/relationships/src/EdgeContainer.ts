import type { ComponentType, Entity, EntityStore } from '../../world/src/index.js';
import { RelationshipNotFoundError } from './errors.js';

export type LookupResult<T> = { found: true; value: T } | { found: false };

/**
 * View of an edge container handed to application code. Mutation goes through
 * RelationshipService so both ends stay in sync.
 */
export interface ReadonlyEdgeContainer<T> extends Iterable<[Entity, T]> {
  readonly count: number;
  contains(target: Entity): boolean;
  get(target: Entity): T;
  tryGet(target: Entity): LookupResult<T>;
  entries(): IterableIterator<[Entity, T]>;
  targets(): Entity[];
}

/**
 * Per-entity, per-kind map of partner entity -> payload.
 * Never left attached while empty; callers detach once count reaches 0.
 */
export class EdgeContainer<T> implements ReadonlyEdgeContainer<T> {
  readonly type: ComponentType<EdgeContainer<T>>;
  // boxed so that tag kinds with an undefined payload still resolve
  private readonly elements: Map<Entity, { value: T }> = new Map();

  constructor(type: ComponentType<EdgeContainer<T>>) {
    this.type = type;
  }

  get count(): number {
    return this.elements.size;
  }

  /**
   * Insert or overwrite the entry for target
   */
  add(target: Entity, payload: T): void {
    this.elements.set(target, { value: payload });
  }

  remove(target: Entity): boolean {
    return this.elements.delete(target);
  }

  contains(target: Entity): boolean {
    return this.elements.has(target);
  }

  get(target: Entity): T {
    const entry = this.elements.get(target);
    if (!entry) {
      throw new RelationshipNotFoundError(`${this.type.name} has no entry for entity ${target}`, {
        component: this.type.name,
        target,
      });
    }
    return entry.value;
  }

  tryGet(target: Entity): LookupResult<T> {
    const entry = this.elements.get(target);
    return entry ? { found: true, value: entry.value } : { found: false };
  }

  *entries(): IterableIterator<[Entity, T]> {
    for (const [target, entry] of this.elements) {
      yield [target, entry.value];
    }
  }

  targets(): Entity[] {
    return Array.from(this.elements.keys());
  }

  [Symbol.iterator](): IterableIterator<[Entity, T]> {
    return this.entries();
  }

  detach(store: EntityStore, entity: Entity): void {
    store.remove(entity, this.type);
  }
}
