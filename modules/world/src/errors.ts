/**
 * World 错误定义
 */

import type { Entity } from './types.js';

export class WorldError extends Error {
  public code: string;
  public context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'WorldError';
    this.code = 'WORLD_ERROR';
    this.context = context;
  }
}

export class EntityNotAliveError extends WorldError {
  constructor(entity: Entity, context?: Record<string, unknown>) {
    super(`Entity ${entity} is not alive`, { entity, ...context });
    this.name = 'EntityNotAliveError';
    this.code = 'ENTITY_NOT_ALIVE';
  }
}

export class ComponentNotFoundError extends WorldError {
  constructor(entity: Entity, component: string) {
    super(`Entity ${entity} has no component ${component}`, { entity, component });
    this.name = 'ComponentNotFoundError';
    this.code = 'COMPONENT_NOT_FOUND';
  }
}
