/**
 * Intake domain types
 *
 * Shared by the prompt/schema generators, the extractor, the dynamic agent
 * and the persistence layer.
 */

export enum FieldType {
  TEXT = 'text',
  TEXTAREA = 'textarea',
  NAME = 'name',
  ADDRESS = 'address',
  NUMBER = 'number',
  CURRENCY = 'currency',
  BOOLEAN = 'boolean',
  DATE = 'date',
  TIME = 'time',
  DATETIME = 'datetime',
  EMAIL = 'email',
  PHONE = 'phone',
  CHOICE = 'choice',
  MULTICHOICE = 'multichoice',
}

export enum Industry {
  LEGAL = 'legal',
  HEALTHCARE = 'healthcare',
  REAL_ESTATE = 'real_estate',
  HOME_SERVICES = 'home_services',
  RECRUITING = 'recruiting',
  FINANCIAL = 'financial',
  INSURANCE = 'insurance',
  EDUCATION = 'education',
  HOSPITALITY = 'hospitality',
  OTHER = 'other',
}

export enum AgentTone {
  PROFESSIONAL = 'professional',
  FRIENDLY = 'friendly',
  EMPATHETIC = 'empathetic',
  FORMAL = 'formal',
  CASUAL = 'casual',
}

export enum TtsVoice {
  ALLOY = 'alloy',
  ECHO = 'echo',
  FABLE = 'fable',
  ONYX = 'onyx',
  NOVA = 'nova',
  SHIMMER = 'shimmer',
}

/**
 * ISO 639-1 codes the agent can converse in
 */
export const SUPPORTED_LANGUAGES: Readonly<Record<string, string>> = {
  en: 'English',
  es: 'Spanish',
  fr: 'French',
  de: 'German',
  it: 'Italian',
  pt: 'Portuguese',
  zh: 'Chinese',
  ja: 'Japanese',
  ko: 'Korean',
};

/**
 * One datum to collect from the end user
 */
export interface FieldSpecification {
  /** Unique within a configuration; used as the record key and patch path */
  key: string;
  label: string;
  type: FieldType;
  required: boolean;
  description?: string;
  /** Canonical options for choice and multichoice fields */
  choices?: string[];
  example?: string;
  order?: number;
}

export interface AgentPersona {
  name: string;
  tone: AgentTone;
  greeting?: string;
  closing?: string;
  voice: TtsVoice;
  language: string;
}

export interface BusinessProfile {
  name: string;
  description?: string;
}

/**
 * Runtime description of what to collect and how the agent presents itself.
 * Sessions hold a snapshot of this shape, taken when they start.
 */
export interface FormConfiguration {
  id: string;
  name: string;
  industry: Industry;
  business: BusinessProfile;
  agent: AgentPersona;
  fields: FieldSpecification[];
}

export type TurnRole = 'user' | 'agent';

export interface ConversationTurn {
  role: TurnRole;
  text: string;
  /** ISO-8601 */
  timestamp: string;
  isVoice?: boolean;
}

export type RecordValue = string | number | boolean | string[];

/**
 * Collected data so far. Absent keys have not been collected yet.
 */
export type PartialRecord = Record<string, RecordValue>;

export type PatchOp = 'add' | 'replace' | 'remove';

export interface PatchOperation {
  op: PatchOp;
  /** JSON pointer to a top-level field, e.g. `/email` */
  path: string;
  value?: unknown;
}

/**
 * A patch operation whose path and value were checked against the
 * configuration. `value` is present for add/replace only.
 */
export type ValidatedPatch =
  | { op: 'add' | 'replace'; key: string; value: RecordValue }
  | { op: 'remove'; key: string };

export enum AgentState {
  AWAITING_INPUT = 'awaiting_input',
  GENERATING_REPLY = 'generating_reply',
  EXTRACTING = 'extracting',
  COMPLETE = 'complete',
}

/** States a session can be persisted in; the others only exist mid-turn */
export type PersistedAgentState = AgentState.AWAITING_INPUT | AgentState.COMPLETE;

export interface ConversationSession {
  id: string;
  formId: string;
  configuration: FormConfiguration;
  language: string;
  turns: ConversationTurn[];
  record: PartialRecord;
  complete: boolean;
  status: PersistedAgentState;
  /** Incremented on every successful save */
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface TurnResult {
  sessionId: string;
  reply: string;
  partialRecord: PartialRecord;
  completion: boolean;
}

export interface SessionState {
  sessionId: string;
  formId: string;
  language: string;
  status: PersistedAgentState;
  turns: ConversationTurn[];
  partialRecord: PartialRecord;
  completion: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface SessionSummary {
  sessionId: string;
  formId: string;
  turnCount: number;
  completion: boolean;
  createdAt: Date;
  updatedAt: Date;
}
