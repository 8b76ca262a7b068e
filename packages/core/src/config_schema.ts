/**
 * AJV JSON Schema for resolved askdb settings.
 * Plain object schema; values read from the environment arrive as strings
 * and are coerced by the validator.
 */

export const settingsSchema = {
  type: 'object' as const,
  properties: {
    model: { type: 'string' as const, minLength: 1 },
    temperature: { type: 'number' as const, minimum: 0, maximum: 2 },
    maxOutputTokens: { type: 'integer' as const, minimum: 1, maximum: 32768 },
    maxRevisions: { type: 'integer' as const, minimum: 0, maximum: 10 },
  },
  required: ['model', 'temperature', 'maxOutputTokens', 'maxRevisions'] as const,
  additionalProperties: false,
};
