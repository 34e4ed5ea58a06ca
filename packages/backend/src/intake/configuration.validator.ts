import { ConfigurationError } from './intake.errors';
import { FieldSpecification, FieldType, FormConfiguration } from './intake.types';

const FIELD_KEY_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;
const FIELD_TYPES = new Set<string>(Object.values(FieldType));

export function isChoiceField(field: FieldSpecification): boolean {
  return field.type === FieldType.CHOICE || field.type === FieldType.MULTICHOICE;
}

/**
 * Collect every problem with a configuration. An empty list means usable.
 */
export function findConfigurationProblems(config: FormConfiguration): string[] {
  const problems: string[] = [];

  if (!config.fields || config.fields.length === 0) {
    problems.push('at least one field is required');
    return problems;
  }

  if (!config.agent?.name?.trim()) {
    problems.push('agent name is required');
  }

  const seen = new Set<string>();
  config.fields.forEach((field, index) => {
    const where = `field #${index + 1}${field.key ? ` (${field.key})` : ''}`;

    if (!FIELD_KEY_PATTERN.test(field.key ?? '')) {
      problems.push(`${where}: key must start with a letter and contain only letters, digits or _`);
    } else if (seen.has(field.key)) {
      problems.push(`${where}: duplicate key`);
    } else {
      seen.add(field.key);
    }

    if (!field.label?.trim()) {
      problems.push(`${where}: label is required`);
    }

    if (!FIELD_TYPES.has(field.type)) {
      problems.push(`${where}: unknown type "${String(field.type)}"`);
    }

    if (isChoiceField(field)) {
      const choices = field.choices ?? [];
      if (choices.length === 0) {
        problems.push(`${where}: choice fields need at least one choice`);
      }
      const normalized = choices.map((choice) => choice.trim().toLowerCase());
      if (normalized.some((choice) => choice.length === 0)) {
        problems.push(`${where}: choices cannot be empty`);
      }
      if (new Set(normalized).size !== normalized.length) {
        problems.push(`${where}: duplicate choices`);
      }
    }
  });

  return problems;
}

export function validateFormConfiguration(config: FormConfiguration): void {
  const problems = findConfigurationProblems(config);
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
}

/**
 * Fields in presentation order: by `order`, then declaration order
 */
export function orderedFields(config: FormConfiguration): FieldSpecification[] {
  return config.fields
    .map((field, index) => ({ field, index }))
    .sort((a, b) => (a.field.order ?? a.index) - (b.field.order ?? b.index) || a.index - b.index)
    .map(({ field }) => field);
}
