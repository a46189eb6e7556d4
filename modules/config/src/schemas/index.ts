// JSON Schema 导出

export { destructionCascadeSchema, type DestructionCascadeSchema } from './destruction-cascade.schema.js';
export { loggingSchema, type LoggingSchema } from './logging.schema.js';

// 主 Schema - 组合所有子 Schema
export const mainSchema = {
  $id: 'https://ecs-relationships.dev/schemas/main.json',
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  description: 'ecs-relationships 主配置文件',
  properties: {
    destructionCascade: {
      $ref: 'https://ecs-relationships.dev/schemas/destruction-cascade.json#'
    },
    logging: {
      $ref: 'https://ecs-relationships.dev/schemas/logging.json#'
    }
  },
  required: ['destructionCascade', 'logging'],
  additionalProperties: false
} as const;

export type MainSchema = typeof mainSchema;
