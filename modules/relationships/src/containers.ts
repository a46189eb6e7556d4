import type { Entity, EntityStore } from '../../world/src/index.js';
import { EdgeContainer } from './EdgeContainer.js';
import { InRelationships, type AnyRelationshipKind, type RelationshipKind } from './kinds.js';

export function addOrGetRelationships<T>(store: EntityStore, kind: RelationshipKind<T>, entity: Entity): EdgeContainer<T> {
  const existing = store.tryGet(entity, kind.component);
  if (existing) {
    return existing;
  }
  const container = new EdgeContainer<T>(kind.component);
  store.add(entity, kind.component, container);
  return container;
}

/**
 * Record on target's reverse container that source points at it with kind
 */
export function linkReverse(store: EntityStore, target: Entity, source: Entity, kind: AnyRelationshipKind): void {
  const inbound = addOrGetRelationships(store, InRelationships, target);
  const record = inbound.tryGet(source);
  if (record.found) {
    record.value.kinds.add(kind);
  } else {
    inbound.add(source, { kinds: new Set([kind]) });
  }
}

/**
 * Remove target from owner's forward container of kind, detaching it once empty.
 * Returns false when there was nothing to remove.
 */
export function removeForwardEntry(store: EntityStore, kind: AnyRelationshipKind, owner: Entity, target: Entity): boolean {
  const outbound = store.tryGet(owner, kind.component);
  if (!outbound || !outbound.remove(target)) {
    return false;
  }
  if (outbound.count === 0) {
    outbound.detach(store, owner);
  }
  return true;
}

/**
 * Drop kind from owner's reverse record for partner. The record goes once it lists
 * no kinds, the reverse container once it holds no records.
 */
export function removeReverseEntry(store: EntityStore, owner: Entity, partner: Entity, kind: AnyRelationshipKind): boolean {
  const inbound = store.tryGet(owner, InRelationships.component);
  if (!inbound) {
    return false;
  }
  const record = inbound.tryGet(partner);
  if (!record.found || !record.value.kinds.delete(kind)) {
    return false;
  }
  if (record.value.kinds.size === 0) {
    inbound.remove(partner);
    if (inbound.count === 0) {
      inbound.detach(store, owner);
    }
  }
  return true;
}
