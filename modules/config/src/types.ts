// 配置类型定义

export interface DestructionCascadeConfig {
  /**
   * Subscribe relationship cleanup to entity destruction
   */
  enabled: boolean;
}

export interface LoggingConfig {
  debug: boolean;
  /**
   * Directory for debug.jsonl; falls back to ECS_RELATIONSHIPS_LOG_DIR, then ~/.ecs-relationships/logs
   */
  logDir?: string;
}

export interface RelationshipsConfig {
  destructionCascade: DestructionCascadeConfig;
  logging: LoggingConfig;
}

export type DeepPartial<T> = T extends Array<infer U>
  ? Array<DeepPartial<U>>
  : T extends object
    ? { [K in keyof T]?: DeepPartial<T[K]> }
    : T;

export interface ConfigLoaderOptions {
  configPath?: string;
  /**
   * 是否缓存已加载的配置（默认 true）
   */
  cache?: boolean;
}

export interface ValidationResult {
  valid: boolean;
  errors?: Array<{
    path: string;
    message: string;
  }>;
}
