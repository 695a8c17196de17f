/**
 * JSON Schema for `.prefixrun.toml`, applied with ajv after TOML parsing.
 *
 * Kept as a plain object so it can be passed straight to `ajv.compile()`.
 */

export const CONFIG_JSON_SCHEMA = {
  $id: 'prefixrun/config.json',
  type: 'object' as const,
  additionalProperties: false,
  properties: {
    extensions: {
      type: 'object',
      propertyNames: { type: 'string', pattern: '^\\.[^./\\\\]+$' },
      additionalProperties: {
        type: 'array',
        minItems: 1,
        items: { type: 'string', minLength: 1 },
      },
    },
    runner: {
      type: 'object',
      additionalProperties: false,
      properties: {
        unknown_extension: { type: 'string', enum: ['abort', 'skip'] },
        duplicate_prefix: { type: 'string', enum: ['sort', 'error'] },
      },
    },
    logging: {
      type: 'object',
      additionalProperties: false,
      properties: {
        level: { type: 'string', enum: ['debug', 'info', 'warn', 'error'] },
      },
    },
  },
};
