/**
 * Relationship Service
 *
 * Directed, typed, payload-bearing edges between entities. Every edge lives in
 * two places:
 * - source's forward container of its kind (target -> payload)
 * - target's InRelationships container (source -> kinds)
 * All mutating operations update both sides before returning.
 */

import type { Entity, EntityStore } from '../../world/src/index.js';
import { logDebug } from '../../logging/src/index.js';
import { handleRelationshipCleanup } from './cascade.js';
import { addOrGetRelationships, linkReverse, removeForwardEntry, removeReverseEntry } from './containers.js';
import type { ReadonlyEdgeContainer } from './EdgeContainer.js';
import { RelationshipKindError, RelationshipNotFoundError } from './errors.js';
import { InRelationships, type AnyRelationshipKind, type RelationshipKind } from './kinds.js';

export interface RelationshipServiceOptions {
  /**
   * Clean up relationships when the store destroys an entity (default false).
   * Requires a store with subscribeEntityDestroyed.
   */
  enableDestructionCascade?: boolean;
}

export interface TryGetResult<T> {
  found: boolean;
  /** a fresh copy of kind.defaultValue when not found */
  relationship: T;
}

export class RelationshipService {
  private readonly store: EntityStore;
  private unsubscribeCascade: (() => void) | null = null;

  constructor(store: EntityStore, options: RelationshipServiceOptions = {}) {
    this.store = store;
    if (options.enableDestructionCascade) {
      this.unsubscribeCascade = handleRelationshipCleanup(store);
    }
  }

  get cascadeEnabled(): boolean {
    return this.unsubscribeCascade !== null;
  }

  /**
   * Add (or overwrite) source --kind--> target
   */
  addRelationship<T>(kind: RelationshipKind<T>, source: Entity, target: Entity, payload: T = kind.createDefault()): void {
    this.assertWritable(kind, 'addRelationship');

    const outbound = addOrGetRelationships(this.store, kind, source);
    outbound.add(target, payload);
    linkReverse(this.store, target, source, kind);

    logDebug('relationships', 'relationship:add', { kind: kind.name, source, target });
  }

  /**
   * Return the existing payload, or add the relationship with payload and return it.
   * An existing payload is never replaced.
   */
  addOrGetRelationship<T>(kind: RelationshipKind<T>, source: Entity, target: Entity, payload: T = kind.createDefault()): T {
    this.assertWritable(kind, 'addOrGetRelationship');

    const existing = this.store.tryGet(source, kind.component)?.tryGet(target);
    if (existing !== undefined && existing.found) {
      return existing.value;
    }

    this.addRelationship(kind, source, target, payload);
    return this.getRelationship(kind, source, target);
  }

  /**
   * With a target: whether source --kind--> target exists.
   * Without: whether source has any relationship of kind.
   */
  hasRelationship<T>(kind: RelationshipKind<T>, source: Entity, target?: Entity): boolean {
    const outbound = this.store.tryGet(source, kind.component);
    if (!outbound) {
      return false;
    }
    return target === undefined || outbound.contains(target);
  }

  /**
   * @throws RelationshipNotFoundError when source has no such relationship
   */
  getRelationship<T>(kind: RelationshipKind<T>, source: Entity, target: Entity): T {
    const result = this.getRelationships(kind, source).tryGet(target);
    if (!result.found) {
      throw new RelationshipNotFoundError(`Entity ${source} has no ${kind.name} relationship to entity ${target}`, {
        kind: kind.name,
        source,
        target,
      });
    }
    return result.value;
  }

  tryGetRelationship<T>(kind: RelationshipKind<T>, source: Entity, target: Entity): TryGetResult<T> {
    const result = this.store.tryGet(source, kind.component)?.tryGet(target);
    if (result === undefined || !result.found) {
      return { found: false, relationship: kind.createDefault() };
    }
    return { found: true, relationship: result.value };
  }

  /**
   * Remove source --kind--> target from both ends, detaching containers that end up empty.
   * @throws RelationshipNotFoundError before touching anything when either side is missing
   */
  removeRelationship<T>(kind: RelationshipKind<T>, source: Entity, target: Entity): void {
    this.assertWritable(kind, 'removeRelationship');

    if (!this.hasRelationship(kind, source, target)) {
      throw new RelationshipNotFoundError(`Entity ${source} has no ${kind.name} relationship to entity ${target}`, {
        kind: kind.name,
        source,
        target,
      });
    }
    const record = this.store.tryGet(target, InRelationships.component)?.tryGet(source);
    if (record === undefined || !record.found || !record.value.kinds.has(kind)) {
      throw new RelationshipNotFoundError(`Entity ${target} has no inbound ${kind.name} record for entity ${source}`, {
        kind: kind.name,
        source,
        target,
      });
    }

    removeForwardEntry(this.store, kind, source, target);
    removeReverseEntry(this.store, target, source, kind);

    logDebug('relationships', 'relationship:remove', { kind: kind.name, source, target });
  }

  /**
   * All relationships of kind held by source.
   * @throws RelationshipNotFoundError when source has none
   */
  getRelationships<T>(kind: RelationshipKind<T>, source: Entity): ReadonlyEdgeContainer<T> {
    const outbound = this.store.tryGet(source, kind.component);
    if (!outbound) {
      throw new RelationshipNotFoundError(`Entity ${source} has no ${kind.name} relationships`, {
        kind: kind.name,
        source,
      });
    }
    return outbound;
  }

  tryGetRelationships<T>(kind: RelationshipKind<T>, source: Entity): ReadonlyEdgeContainer<T> | undefined {
    return this.store.tryGet(source, kind.component);
  }

  /**
   * Entities with a relationship pointing at target, optionally restricted to one kind
   */
  getSources(target: Entity, kind?: AnyRelationshipKind): Entity[] {
    const inbound = this.store.tryGet(target, InRelationships.component);
    if (!inbound) {
      return [];
    }
    const sources: Entity[] = [];
    for (const [source, record] of inbound) {
      if (!kind || record.kinds.has(kind)) {
        sources.push(source);
      }
    }
    return sources;
  }

  /**
   * Stop reacting to entity destruction
   */
  dispose(): void {
    if (this.unsubscribeCascade) {
      this.unsubscribeCascade();
      this.unsubscribeCascade = null;
    }
  }

  private assertWritable(kind: AnyRelationshipKind, operation: string): void {
    if (kind.reserved) {
      throw new RelationshipKindError(`${kind.name} is maintained internally and cannot be passed to ${operation}`, {
        kind: kind.name,
        operation,
      });
    }
  }
}
