/**
 * 关系错误定义
 */

export class RelationshipError extends Error {
  public code: string;
  public context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'RelationshipError';
    this.code = 'RELATIONSHIP_ERROR';
    this.context = context;
  }
}

export class RelationshipNotFoundError extends RelationshipError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = 'RelationshipNotFoundError';
    this.code = 'RELATIONSHIP_NOT_FOUND';
  }
}

export class RelationshipKindError extends RelationshipError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = 'RelationshipKindError';
    this.code = 'RELATIONSHIP_KIND_ERROR';
  }
}

export class RelationshipConfigError extends RelationshipError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = 'RelationshipConfigError';
    this.code = 'RELATIONSHIP_CONFIG_ERROR';
  }
}
