import { ComponentType } from '../../world/src/index.js';
import type { EdgeContainer } from './EdgeContainer.js';

/**
 * One independent category of edge. Each kind owns its own component slot, so
 * `Likes` and `Knows` between the same two entities never share storage.
 */
export interface RelationshipKind<T> {
  readonly id: number;
  readonly name: string;
  /** Template for payloads added without one and for soft misses; never handed out itself */
  readonly defaultValue: T;
  /** Fresh structured clone of defaultValue */
  createDefault(): T;
  readonly component: ComponentType<EdgeContainer<T>>;
  /** Reserved kinds are maintained by the library and cannot be written directly */
  readonly reserved: boolean;
}

export type AnyRelationshipKind = RelationshipKind<unknown>;

/**
 * Reverse-side record: every kind for which the partner points at the owner.
 */
export interface InRelationship {
  kinds: Set<AnyRelationshipKind>;
}

const registry: AnyRelationshipKind[] = [];
let nextKindId = 1;

function createKind<T>(name: string, defaultValue: T, reserved: boolean): RelationshipKind<T> {
  const kind: RelationshipKind<T> = {
    id: nextKindId++,
    name,
    defaultValue,
    createDefault: () => structuredClone(defaultValue),
    component: new ComponentType<EdgeContainer<T>>(`Relationship<${name}>`),
    reserved,
  };
  registry.push(kind);
  return kind;
}

export function defineRelationship(name: string): RelationshipKind<undefined>;
export function defineRelationship<T>(name: string, defaultValue: T): RelationshipKind<T>;
export function defineRelationship<T>(name: string, defaultValue?: T): RelationshipKind<T | undefined> {
  return createKind<T | undefined>(name, defaultValue, false);
}

/**
 * Reverse index kind. `hasRelationship(InRelationships, e)` tells whether anything points at e.
 */
export const InRelationships: RelationshipKind<InRelationship> = createKind<InRelationship>(
  'InRelationships',
  { kinds: new Set() },
  true,
);

/**
 * Every user-defined kind, in definition order
 */
export function listRelationshipKinds(): AnyRelationshipKind[] {
  return registry.filter((kind) => !kind.reserved);
}
