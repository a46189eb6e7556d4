// 级联销毁配置的 JSON Schema

export const destructionCascadeSchema = {
  $id: 'https://ecs-relationships.dev/schemas/destruction-cascade.json',
  type: 'object',
  properties: {
    enabled: {
      type: 'boolean',
      description: 'Remove every relationship of an entity when it is destroyed',
      default: false
    }
  },
  required: ['enabled'],
  additionalProperties: false
} as const;

export type DestructionCascadeSchema = typeof destructionCascadeSchema;
