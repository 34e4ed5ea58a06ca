import { FormConfigurationEntity } from '../database/entities/form-configuration.entity';
import { isChoiceField } from '../intake/configuration.validator';
import { AgentPersona, BusinessProfile, FieldSpecification } from '../intake/intake.types';
import { StoredConfiguration } from '../intake/provider.interfaces';
import { AgentDto, BusinessDto, FieldDto } from './dto/form.dto';

/**
 * Plain field specifications from validated DTOs. Choices are kept only on
 * choice and multichoice fields and are trimmed.
 */
export function toFieldSpecifications(fields: FieldDto[]): FieldSpecification[] {
  return fields.map((field) => {
    const spec: FieldSpecification = {
      key: field.key,
      label: field.label.trim(),
      type: field.type,
      required: field.required ?? false,
    };
    if (field.description) {
      spec.description = field.description;
    }
    if (field.example) {
      spec.example = field.example;
    }
    if (field.order !== undefined) {
      spec.order = field.order;
    }
    if (isChoiceField(spec)) {
      spec.choices = (field.choices ?? []).map((choice) => choice.trim());
    }
    return spec;
  });
}

export function toAgentPersona(agent: AgentDto): AgentPersona {
  const persona: AgentPersona = {
    name: agent.name.trim(),
    tone: agent.tone,
    voice: agent.voice,
    language: agent.language,
  };
  if (agent.greeting) {
    persona.greeting = agent.greeting;
  }
  if (agent.closing) {
    persona.closing = agent.closing;
  }
  return persona;
}

export function toBusinessProfile(business: BusinessDto): BusinessProfile {
  return business.description
    ? { name: business.name.trim(), description: business.description }
    : { name: business.name.trim() };
}

export function toStoredConfiguration(entity: FormConfigurationEntity): StoredConfiguration {
  return {
    id: entity.id,
    name: entity.name,
    industry: entity.industry,
    business: entity.business,
    agent: entity.agent,
    fields: entity.fields,
    isActive: entity.isActive,
    createdAt: entity.createdAt,
    updatedAt: entity.updatedAt,
  };
}
