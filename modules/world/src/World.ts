/**
 * World Module
 *
 * In-process entity-component store:
 * - Entity allocation (handles are never reused)
 * - Component attach/detach/lookup through typed ComponentType keys
 * - Synchronous lifecycle events (entity:created, entity:destroyed)
 */

import { EventEmitter } from 'events';
import type { ComponentType } from './ComponentType.js';
import { ComponentNotFoundError, EntityNotAliveError } from './errors.js';
import type { Entity, EntityListener, EntityStore } from './types.js';

export class World extends EventEmitter implements EntityStore {
  private nextEntity: Entity = 1;
  private alive: Set<Entity> = new Set();
  private componentTypes: Set<ComponentType<object>> = new Set();

  constructor() {
    super();
    // one destroy listener per cascading service; no fixed cap
    this.setMaxListeners(0);
  }

  /**
   * Allocate a new entity
   */
  create(): Entity {
    const entity = this.nextEntity++;
    this.alive.add(entity);
    this.emit('entity:created', entity);
    return entity;
  }

  /**
   * Destroy an entity. Listeners of entity:destroyed run first and can still
   * read the entity's components; everything attached is dropped afterwards.
   */
  destroy(entity: Entity): void {
    if (!this.alive.has(entity)) {
      throw new EntityNotAliveError(entity, { operation: 'destroy' });
    }

    this.emit('entity:destroyed', entity);

    for (const type of this.componentTypes) {
      type.table(this).delete(entity);
    }
    this.alive.delete(entity);
  }

  isAlive(entity: Entity): boolean {
    return this.alive.has(entity);
  }

  get size(): number {
    return this.alive.size;
  }

  add<C extends object>(entity: Entity, type: ComponentType<C>, component: C): void {
    if (!this.alive.has(entity)) {
      throw new EntityNotAliveError(entity, { operation: 'add', component: type.name });
    }
    this.componentTypes.add(type);
    type.table(this).set(entity, component);
  }

  get<C extends object>(entity: Entity, type: ComponentType<C>): C {
    const component = type.table(this).get(entity);
    if (component === undefined) {
      throw new ComponentNotFoundError(entity, type.name);
    }
    return component;
  }

  tryGet<C extends object>(entity: Entity, type: ComponentType<C>): C | undefined {
    return type.table(this).get(entity);
  }

  has<C extends object>(entity: Entity, type: ComponentType<C>): boolean {
    return type.table(this).has(entity);
  }

  remove<C extends object>(entity: Entity, type: ComponentType<C>): void {
    type.table(this).delete(entity);
  }

  /**
   * Names of every component attached to the entity, in registration order
   */
  componentNames(entity: Entity): string[] {
    const names: string[] = [];
    for (const type of this.componentTypes) {
      if (type.table(this).has(entity)) {
        names.push(type.name);
      }
    }
    return names;
  }

  subscribeEntityDestroyed(listener: EntityListener): () => void {
    this.on('entity:destroyed', listener);
    return () => {
      this.off('entity:destroyed', listener);
    };
  }
}
