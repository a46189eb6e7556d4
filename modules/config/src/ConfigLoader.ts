import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { ConfigValidator } from './ConfigValidator.js';
import type { ConfigLoaderOptions, DeepPartial, RelationshipsConfig, ValidationResult } from './types.js';

function resolveHomeDir() {
  // On Windows, Git Bash may set HOME like "/c/Users/xxx" which breaks `path.join` (win32).
  const homeDir =
    process.platform === 'win32'
      ? (process.env.USERPROFILE || os.homedir() || '')
      : (process.env.HOME || os.homedir() || '');
  if (!homeDir) throw new Error('Cannot resolve home directory: HOME/USERPROFILE not set');
  return homeDir;
}

/**
 * 配置加载器
 * 负责加载、验证和缓存配置文件
 */
export class ConfigLoader {
  private validator: ConfigValidator;
  private configPath: string;
  private config: RelationshipsConfig | null = null;
  private cacheEnabled: boolean;

  constructor(options: ConfigLoaderOptions = {}) {
    this.validator = new ConfigValidator();
    this.cacheEnabled = options.cache !== false;

    // 优先级：1. 传入的 configPath 2. 环境变量 ECS_RELATIONSHIPS_CONFIG_PATH 3. 默认 ~/.ecs-relationships/config.json
    this.configPath =
      options.configPath ||
      process.env.ECS_RELATIONSHIPS_CONFIG_PATH ||
      path.join(resolveHomeDir(), '.ecs-relationships', 'config.json');
  }

  /**
   * 加载配置
   * @throws 如果配置文件不存在（且未设置 createIfMissing）或验证失败
   */
  async load(options: { createIfMissing?: boolean } = {}): Promise<RelationshipsConfig> {
    if (this.cacheEnabled && this.config) {
      return this.config;
    }

    try {
      await fs.access(this.configPath);
    } catch {
      if (!options.createIfMissing) {
        throw new Error(`Config file not found: ${this.configPath}`);
      }
      const created = this.validator.getDefaultConfig();
      await this.save(created);
      return created;
    }

    const content = await fs.readFile(this.configPath, 'utf-8');
    const rawConfig: unknown = JSON.parse(content);

    const config = this.assertValid(rawConfig);
    this.config = config;
    return config;
  }

  /**
   * 保存配置
   */
  async save(config: RelationshipsConfig): Promise<void> {
    this.assertValid(config);

    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(
      this.configPath,
      JSON.stringify(config, null, 2),
      'utf-8'
    );

    this.config = config;
  }

  /**
   * 重新加载配置
   */
  async reload(): Promise<RelationshipsConfig> {
    this.config = null;
    return this.load();
  }

  /**
   * 获取配置（不加载，仅返回缓存）
   */
  get(): RelationshipsConfig | null {
    return this.config;
  }

  async validate(): Promise<ValidationResult> {
    return this.validator.validateFile(this.configPath);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getDefaultConfig(): RelationshipsConfig {
    return this.validator.getDefaultConfig();
  }

  merge(base: RelationshipsConfig, override: DeepPartial<RelationshipsConfig>): RelationshipsConfig {
    return {
      destructionCascade: { ...base.destructionCascade, ...override.destructionCascade },
      logging: { ...base.logging, ...override.logging },
    };
  }

  private assertValid(config: unknown): RelationshipsConfig {
    if (this.validator.isConfig(config)) {
      return config;
    }
    const result = this.validator.validate(config);
    const errorMessages = result.errors?.map((e) => `  - ${e.path}: ${e.message}`).join('\n');
    throw new Error(`Config validation failed:\n${errorMessages}`);
  }
}
