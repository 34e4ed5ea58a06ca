import { ConfigurationError } from './intake.errors';
import { FIELD_TYPE_INFO, TONE_INFO } from './field-catalog';
import { isChoiceField, orderedFields } from './configuration.validator';
import { hasRecordValue } from './record-patch';
import {
  FieldSpecification,
  FormConfiguration,
  PartialRecord,
  RecordValue,
  SUPPORTED_LANGUAGES,
} from './intake.types';

export interface PromptOptions {
  /** Values already collected; listed so the agent does not ask again */
  collected?: PartialRecord;
}

/**
 * Build the agent's system prompt from a form configuration.
 *
 * Pure: the same configuration and options always give the same text.
 */
export function generateSystemPrompt(config: FormConfiguration, options: PromptOptions = {}): string {
  if (!config.fields || config.fields.length === 0) {
    throw new ConfigurationError(['at least one field is required']);
  }

  const { agent, business } = config;
  const fields = orderedFields(config);
  const language = SUPPORTED_LANGUAGES[agent.language] ?? SUPPORTED_LANGUAGES.en;

  const sections = [
    `You are ${agent.name}, a conversational intake assistant for ${business.name}.` +
      (business.description ? ` About the business: ${business.description}` : ''),
    `**Tone**: ${TONE_INFO[agent.tone]?.guidance ?? TONE_INFO.professional.guidance}`,
    `**Your goal**: collect the information below through a natural conversation. ` +
      `Do not interrogate the person field by field and never read the list out. ` +
      `Ask for one or two things at a time, follow up on what they say, and accept ` +
      `information given out of order. Confirm details that are easy to mishear ` +
      `(names, emails, phone numbers). Keep replies short enough to be spoken aloud.`,
    `**Information to collect**:\n${fields.map(describeField).join('\n')}`,
  ];

  const collected = describeCollected(fields, options.collected);
  if (collected) {
    sections.push(`**Already collected** (do not ask again unless the person corrects it):\n${collected}`);
  }

  sections.push(
    `**Opening**: the conversation began with your greeting: "${generateGreeting(config)}"`,
    `**Finishing**: once every required item is collected, summarise what you have, ` +
      `ask the person to confirm, then close with: "${generateClosing(config)}"`,
    `Always reply in ${language}.`,
  );

  return sections.join('\n\n');
}

/**
 * First agent turn of a new session
 */
export function generateGreeting(config: FormConfiguration): string {
  const custom = config.agent.greeting?.trim();
  if (custom) {
    return custom;
  }
  return `Hi, I'm ${config.agent.name} from ${config.business.name}. I'll help you get started. How can I help you today?`;
}

export function generateClosing(config: FormConfiguration): string {
  const custom = config.agent.closing?.trim();
  if (custom) {
    return custom;
  }
  return `Thank you! I have everything I need. Someone from ${config.business.name} will be in touch soon.`;
}

function describeField(field: FieldSpecification): string {
  const parts = [`- ${field.label} (${FIELD_TYPE_INFO[field.type].promptHint})`];
  parts.push(field.required ? 'required' : 'optional');
  if (isChoiceField(field) && field.choices?.length) {
    parts.push(`options: ${field.choices.join(', ')}`);
  }
  if (field.example) {
    parts.push(`e.g. ${field.example}`);
  }
  const line = parts.join(', ');
  return field.description ? `${line}. ${field.description}` : line;
}

function describeCollected(fields: FieldSpecification[], record?: PartialRecord): string {
  if (!record) {
    return '';
  }
  return fields
    .filter((field) => hasRecordValue(record, field.key))
    .map((field) => `- ${field.label}: ${formatValue(record[field.key])}`)
    .join('\n');
}

function formatValue(value: RecordValue): string {
  if (Array.isArray(value)) {
    return value.join(', ');
  }
  if (typeof value === 'boolean') {
    return value ? 'yes' : 'no';
  }
  return String(value);
}
