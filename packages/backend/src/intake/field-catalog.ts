import { AgentTone, FieldType, Industry, TtsVoice } from './intake.types';

export interface CatalogEntry {
  label: string;
  description: string;
}

export interface FieldTypeInfo extends CatalogEntry {
  /** How the agent should think about values of this type */
  promptHint: string;
}

export const FIELD_TYPE_INFO: Record<FieldType, FieldTypeInfo> = {
  [FieldType.TEXT]: {
    label: 'Short Text',
    description: 'Single line text input',
    promptHint: 'short text',
  },
  [FieldType.TEXTAREA]: {
    label: 'Long Text',
    description: 'Multi-line text input',
    promptHint: 'free-form description, can be several sentences',
  },
  [FieldType.NAME]: {
    label: 'Full Name',
    description: "Person's full name",
    promptHint: "a person's full name",
  },
  [FieldType.ADDRESS]: {
    label: 'Address',
    description: 'Full address input',
    promptHint: 'a street address; city and postal code if offered',
  },
  [FieldType.NUMBER]: {
    label: 'Number',
    description: 'Numeric value',
    promptHint: 'a number',
  },
  [FieldType.CURRENCY]: {
    label: 'Currency',
    description: 'Dollar amount',
    promptHint: 'a monetary amount',
  },
  [FieldType.BOOLEAN]: {
    label: 'Yes/No',
    description: 'True or false question',
    promptHint: 'a yes or no answer',
  },
  [FieldType.DATE]: {
    label: 'Date',
    description: 'Date picker',
    promptHint: 'a calendar date',
  },
  [FieldType.TIME]: {
    label: 'Time',
    description: 'Time picker',
    promptHint: 'a time of day',
  },
  [FieldType.DATETIME]: {
    label: 'Date & Time',
    description: 'Date and time picker',
    promptHint: 'a date together with a time',
  },
  [FieldType.EMAIL]: {
    label: 'Email',
    description: 'Email address with validation',
    promptHint: 'an email address; confirm the spelling',
  },
  [FieldType.PHONE]: {
    label: 'Phone',
    description: 'Phone number',
    promptHint: 'a phone number; read it back to confirm',
  },
  [FieldType.CHOICE]: {
    label: 'Dropdown',
    description: 'Single selection from options',
    promptHint: 'exactly one of the listed options',
  },
  [FieldType.MULTICHOICE]: {
    label: 'Multi-Select',
    description: 'Multiple selections from options',
    promptHint: 'one or more of the listed options',
  },
};

export const INDUSTRY_LABELS: Record<Industry, string> = {
  [Industry.LEGAL]: 'Legal Services',
  [Industry.HEALTHCARE]: 'Healthcare',
  [Industry.REAL_ESTATE]: 'Real Estate',
  [Industry.HOME_SERVICES]: 'Home Services',
  [Industry.RECRUITING]: 'Recruiting',
  [Industry.FINANCIAL]: 'Financial Services',
  [Industry.INSURANCE]: 'Insurance',
  [Industry.EDUCATION]: 'Education',
  [Industry.HOSPITALITY]: 'Hospitality',
  [Industry.OTHER]: 'Other',
};

export interface ToneInfo extends CatalogEntry {
  guidance: string;
}

export const TONE_INFO: Record<AgentTone, ToneInfo> = {
  [AgentTone.PROFESSIONAL]: {
    label: 'Professional',
    description: 'Business-like and courteous',
    guidance: 'Be courteous, clear and efficient.',
  },
  [AgentTone.FRIENDLY]: {
    label: 'Friendly',
    description: 'Warm and approachable',
    guidance: 'Be warm and approachable; light small talk is fine.',
  },
  [AgentTone.EMPATHETIC]: {
    label: 'Empathetic',
    description: 'Understanding and supportive',
    guidance: 'Acknowledge how the person feels before asking for details. Be patient.',
  },
  [AgentTone.FORMAL]: {
    label: 'Formal',
    description: 'Precise and respectful',
    guidance: 'Use formal, precise language and address the person respectfully.',
  },
  [AgentTone.CASUAL]: {
    label: 'Casual',
    description: 'Relaxed and conversational',
    guidance: 'Keep it relaxed and conversational, like a helpful friend.',
  },
};

export const VOICE_INFO: Record<TtsVoice, CatalogEntry> = {
  [TtsVoice.ALLOY]: { label: 'Alloy', description: 'Neutral, balanced voice' },
  [TtsVoice.ECHO]: { label: 'Echo', description: 'Male, warm voice' },
  [TtsVoice.FABLE]: { label: 'Fable', description: 'British, expressive voice' },
  [TtsVoice.ONYX]: { label: 'Onyx', description: 'Male, deep voice' },
  [TtsVoice.NOVA]: { label: 'Nova', description: 'Female, friendly voice' },
  [TtsVoice.SHIMMER]: { label: 'Shimmer', description: 'Female, soft voice' },
};
