import { orderedFields } from './configuration.validator';
import { FieldSpecification, FieldType, FormConfiguration } from './intake.types';

export type JsonSchema = {
  $schema?: string;
  title?: string;
  description?: string;
  type?: string | string[];
  format?: string;
  properties?: Record<string, JsonSchema>;
  items?: JsonSchema;
  required?: string[];
  enum?: unknown[];
  const?: unknown;
  anyOf?: JsonSchema[];
  additionalProperties?: boolean;
  minItems?: number;
  uniqueItems?: boolean;
  [key: string]: unknown;
};

/**
 * Record schema: one optional property per field.
 *
 * Regenerated every turn; the same configuration always yields an equal
 * schema, so nothing needs caching.
 */
export interface RecordSchema extends JsonSchema {
  type: 'object';
  properties: Record<string, JsonSchema>;
  additionalProperties: false;
}

export function generateRecordSchema(config: FormConfiguration): RecordSchema {
  const properties: Record<string, JsonSchema> = {};

  for (const field of orderedFields(config)) {
    properties[field.key] = fieldSchema(field);
  }

  return {
    $schema: 'http://json-schema.org/draft-07/schema#',
    title: config.name,
    type: 'object',
    properties,
    additionalProperties: false,
  };
}

export function fieldSchema(field: FieldSpecification): JsonSchema {
  const schema: JsonSchema = { title: field.label, ...valueSchema(field) };
  if (field.description) {
    schema.description = field.description;
  }
  return schema;
}

function valueSchema(field: FieldSpecification): JsonSchema {
  switch (field.type) {
    case FieldType.NUMBER:
    case FieldType.CURRENCY:
      return { type: 'number' };
    case FieldType.BOOLEAN:
      return { type: 'boolean' };
    case FieldType.DATE:
      return { type: 'string', format: 'date' };
    case FieldType.TIME:
      return { type: 'string', format: 'time' };
    case FieldType.DATETIME:
      return { type: 'string', format: 'date-time' };
    case FieldType.EMAIL:
      return { type: 'string', format: 'email' };
    case FieldType.CHOICE:
      return { type: 'string', enum: [...(field.choices ?? [])] };
    case FieldType.MULTICHOICE:
      return {
        type: 'array',
        items: { type: 'string', enum: [...(field.choices ?? [])] },
        minItems: 1,
        uniqueItems: true,
      };
    default:
      return { type: 'string' };
  }
}

/**
 * Patch schema handed to the extraction capability: an ordered list of
 * add/replace/remove operations against known top-level paths, with each
 * value constrained by its field's property schema.
 */
export function generatePatchSchema(recordSchema: RecordSchema): JsonSchema {
  const keys = Object.keys(recordSchema.properties);
  const setters: JsonSchema[] = keys.map((key) => ({
    type: 'object',
    properties: {
      op: { type: 'string', enum: ['add', 'replace'] },
      path: { type: 'string', const: `/${key}` },
      value: recordSchema.properties[key],
    },
    required: ['op', 'path', 'value'],
    additionalProperties: false,
  }));

  const remover: JsonSchema = {
    type: 'object',
    properties: {
      op: { type: 'string', const: 'remove' },
      path: { type: 'string', enum: keys.map((key) => `/${key}`) },
    },
    required: ['op', 'path'],
    additionalProperties: false,
  };

  return {
    type: 'array',
    description: 'Operations that bring the record up to date, applied in order',
    items: { anyOf: [...setters, remover] },
  };
}
