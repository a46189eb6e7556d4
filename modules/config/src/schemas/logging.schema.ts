// 日志配置的 JSON Schema

export const loggingSchema = {
  $id: 'https://ecs-relationships.dev/schemas/logging.json',
  type: 'object',
  properties: {
    debug: {
      type: 'boolean',
      description: 'Write debug.jsonl entries',
      default: false
    },
    logDir: {
      type: 'string',
      minLength: 1,
      description: 'Directory holding debug.jsonl'
    }
  },
  required: ['debug'],
  additionalProperties: false
} as const;

export type LoggingSchema = typeof loggingSchema;
