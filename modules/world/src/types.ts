// Store contract shared by World and anything layered on top of it.

import type { ComponentType } from './ComponentType.js';

export type Entity = number;

export type EntityListener = (entity: Entity) => void;

export interface EntityStore {
  add<C extends object>(entity: Entity, type: ComponentType<C>, component: C): void;
  /**
   * @throws ComponentNotFoundError when the component is not attached
   */
  get<C extends object>(entity: Entity, type: ComponentType<C>): C;
  /**
   * Components are held by reference, so the returned value can be mutated in place.
   */
  tryGet<C extends object>(entity: Entity, type: ComponentType<C>): C | undefined;
  has<C extends object>(entity: Entity, type: ComponentType<C>): boolean;
  remove<C extends object>(entity: Entity, type: ComponentType<C>): void;
  /**
   * Called once per entity, before its components are reclaimed.
   * Returns an unsubscribe function.
   */
  subscribeEntityDestroyed?(listener: EntityListener): () => void;
}
