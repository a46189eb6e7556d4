// 关系模块主入口

import type { EntityStore } from '../../world/src/index.js';
import type { RelationshipsConfig } from '../../config/src/index.js';
import { configureDebugLog } from '../../logging/src/index.js';
import { RelationshipService } from './RelationshipService.js';

export { RelationshipService } from './RelationshipService.js';
export type { RelationshipServiceOptions, TryGetResult } from './RelationshipService.js';
export { EdgeContainer } from './EdgeContainer.js';
export type { LookupResult, ReadonlyEdgeContainer } from './EdgeContainer.js';
export { defineRelationship, listRelationshipKinds, InRelationships } from './kinds.js';
export type { AnyRelationshipKind, InRelationship, RelationshipKind } from './kinds.js';
export { cleanupRelationships, handleRelationshipCleanup } from './cascade.js';
export {
  RelationshipError,
  RelationshipNotFoundError,
  RelationshipKindError,
  RelationshipConfigError
} from './errors.js';

/**
 * Build a service from a loaded config. logging.debug=false leaves the DEBUG env switch in charge.
 */
export function createRelationshipService(store: EntityStore, config: RelationshipsConfig): RelationshipService {
  configureDebugLog({
    enabled: config.logging.debug ? true : undefined,
    logDir: config.logging.logDir,
  });
  return new RelationshipService(store, {
    enableDestructionCascade: config.destructionCascade.enabled,
  });
}
