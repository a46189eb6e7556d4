import type { Entity, EntityStore } from '../../world/src/index.js';
import { logDebug } from '../../logging/src/index.js';
import { RelationshipConfigError } from './errors.js';
import { InRelationships, listRelationshipKinds } from './kinds.js';
import { removeForwardEntry, removeReverseEntry } from './containers.js';

/**
 * Remove every edge that references entity, on both ends. Also safe on a live
 * entity: its own containers are detached too.
 */
export function cleanupRelationships(store: EntityStore, entity: Entity): number {
  let removed = 0;

  // partners pointing at entity: drop entity from their forward containers
  const inbound = store.tryGet(entity, InRelationships.component);
  if (inbound) {
    for (const [partner, record] of Array.from(inbound.entries())) {
      for (const kind of Array.from(record.kinds)) {
        if (removeForwardEntry(store, kind, partner, entity)) {
          removed += 1;
        }
      }
    }
  }

  // entity pointing at partners: drop entity from their reverse containers
  for (const kind of listRelationshipKinds()) {
    const outbound = store.tryGet(entity, kind.component);
    if (!outbound) continue;
    for (const target of outbound.targets()) {
      if (removeReverseEntry(store, target, entity, kind)) {
        removed += 1;
      }
    }
    outbound.detach(store, entity);
  }

  // self edges may already have emptied and detached it
  store.tryGet(entity, InRelationships.component)?.detach(store, entity);

  logDebug('relationships', 'cascade:cleanup', { entity, removed });
  return removed;
}

/**
 * Subscribe cleanupRelationships to the store's destroy notification.
 * Returns the unsubscribe function.
 */
export function handleRelationshipCleanup(store: EntityStore): () => void {
  if (!store.subscribeEntityDestroyed) {
    throw new RelationshipConfigError('Destruction cascade needs a store with subscribeEntityDestroyed');
  }
  logDebug('relationships', 'cascade:subscribe');
  return store.subscribeEntityDestroyed((entity) => {
    cleanupRelationships(store, entity);
  });
}
