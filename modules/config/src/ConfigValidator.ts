import { Ajv, type ValidateFunction } from 'ajv';
import { mainSchema, destructionCascadeSchema, loggingSchema } from './schemas/index.js';
import type { RelationshipsConfig, ValidationResult } from './types.js';

/**
 * 配置验证器
 * 使用 AJV (Another JSON Schema Validator) 验证配置文件
 */
export class ConfigValidator {
  private ajv: Ajv;
  private validateFn: ValidateFunction<RelationshipsConfig>;

  constructor() {
    this.ajv = new Ajv({
      allErrors: true,
      verbose: true,
      strict: false,
      allowUnionTypes: true
    });

    // 注册所有 schemas（包括子 schema）
    this.registerSchemas();

    // 编译校验函数（避免每次 validate 都 compile）
    this.validateFn = this.ajv.compile<RelationshipsConfig>(mainSchema);
  }

  /**
   * 注册子 schema，主 schema 通过 $ref 引用
   */
  private registerSchemas(): void {
    this.ajv.addSchema(destructionCascadeSchema);
    this.ajv.addSchema(loggingSchema);
  }

  /**
   * 验证配置对象
   */
  validate(config: unknown): ValidationResult {
    const valid = this.validateFn(config);

    if (valid) {
      return { valid: true };
    }

    const errors = this.validateFn.errors?.map((error) => ({
      path: error.instancePath || '/root',
      message: error.message || 'unknown error'
    })) || [];

    return {
      valid: false,
      errors
    };
  }

  /**
   * Type guard over validate()
   */
  isConfig(config: unknown): config is RelationshipsConfig {
    return this.validateFn(config);
  }

  /**
   * 验证配置文件
   * @param configPath 配置文件路径
   */
  async validateFile(configPath: string): Promise<ValidationResult> {
    try {
      const fs = await import('fs/promises');
      const content = await fs.readFile(configPath, 'utf-8');
      const config: unknown = JSON.parse(content);
      return this.validate(config);
    } catch (error) {
      return {
        valid: false,
        errors: [{
          path: configPath,
          message: error instanceof Error ? error.message : 'failed to read or parse config file'
        }]
      };
    }
  }

  getDefaultConfig(): RelationshipsConfig {
    return {
      destructionCascade: {
        enabled: false
      },
      logging: {
        debug: false
      }
    };
  }
}
