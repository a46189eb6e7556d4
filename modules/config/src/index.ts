// 配置模块主入口

import { ConfigLoader } from './ConfigLoader.js';
import type { RelationshipsConfig, ValidationResult } from './types.js';

export { ConfigLoader } from './ConfigLoader.js';
export { ConfigValidator } from './ConfigValidator.js';

export type {
  RelationshipsConfig,
  DestructionCascadeConfig,
  LoggingConfig,
  ConfigLoaderOptions,
  DeepPartial,
  ValidationResult
} from './types.js';

export * from './schemas/index.js';

// 默认配置加载器实例（路径在首次导入时解析）
const defaultLoader = new ConfigLoader();

export async function loadConfig(): Promise<RelationshipsConfig> {
  return defaultLoader.load();
}

export async function saveConfig(config: RelationshipsConfig): Promise<void> {
  return defaultLoader.save(config);
}

export async function reloadConfig(): Promise<RelationshipsConfig> {
  return defaultLoader.reload();
}

export function getConfig(): RelationshipsConfig | null {
  return defaultLoader.get();
}

export async function validateConfig(): Promise<ValidationResult> {
  return defaultLoader.validate();
}

export function getDefaultConfig(): RelationshipsConfig {
  return defaultLoader.getDefaultConfig();
}

export { defaultLoader as loader };
