// World 模块主入口

export { World } from './World.js';
export { ComponentType, defineComponent } from './ComponentType.js';
export { WorldError, EntityNotAliveError, ComponentNotFoundError } from './errors.js';
export type { Entity, EntityListener, EntityStore } from './types.js';
