import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { findConfigurationProblems } from '../intake/configuration.validator';
import { FormConfiguration, Industry } from '../intake/intake.types';
import { isPlainObject } from '../intake/record-patch';
import { CreateFormDto } from './dto/form.dto';
import { toFieldSpecifications } from './forms.mapper';
import catalog from './templates/industry-templates.json';

export interface TemplateInfo {
  id: string;
  name: string;
  industry: Industry;
  fieldCount: number;
  description: string;
}

export interface IndustryTemplate {
  id: string;
  description: string;
  form: CreateFormDto;
}

/**
 * Industry starter configurations, read from industry-templates.json and
 * validated with the same DTOs as API input.
 */
@Injectable()
export class TemplatesService {
  private readonly logger = new Logger(TemplatesService.name);
  private readonly templates: Map<string, IndustryTemplate>;

  constructor() {
    this.templates = new Map<string, IndustryTemplate>(
      loadTemplateCatalog(catalog).map((template) => [template.form.industry, template] as const),
    );
    this.logger.log(`Loaded ${this.templates.size} industry templates`);
  }

  list(): TemplateInfo[] {
    return [...this.templates.values()].map((template) => ({
      id: template.id,
      name: template.form.name,
      industry: template.form.industry,
      fieldCount: template.form.fields.length,
      description: template.description,
    }));
  }

  /**
   * @throws NotFoundException for an industry without a template
   */
  get(industry: string): IndustryTemplate {
    const template = this.templates.get(industry);
    if (!template) {
      throw new NotFoundException(
        `Template not found for industry: ${industry}. Available: ${[...this.templates.keys()].join(', ')}`,
      );
    }
    return template;
  }

  /**
   * The template as a configuration, keyed by the template id
   */
  preview(industry: string): FormConfiguration {
    const { id, form } = this.get(industry);
    return {
      id,
      name: form.name,
      industry: form.industry,
      business: { ...form.business },
      agent: { ...form.agent },
      fields: toFieldSpecifications(form.fields),
    };
  }
}

/**
 * Parse and validate the raw catalog.
 * @throws Error naming the first invalid template
 */
export function loadTemplateCatalog(raw: unknown): IndustryTemplate[] {
  if (!Array.isArray(raw)) {
    throw new Error('Template catalog must be an array');
  }

  return raw.map((entry: unknown, index) => {
    if (!isPlainObject(entry) || typeof entry.id !== 'string' || typeof entry.description !== 'string') {
      throw new Error(`Template #${index + 1} needs an id and a description`);
    }

    const form = plainToInstance(CreateFormDto, entry.form);
    const errors = validateSync(form, { whitelist: true, forbidNonWhitelisted: true });
    if (errors.length > 0) {
      throw new Error(`Invalid template ${entry.id}: ${formatValidationErrors(errors).join('; ')}`);
    }

    const problems = findConfigurationProblems({
      id: entry.id,
      name: form.name,
      industry: form.industry,
      business: form.business,
      agent: form.agent,
      fields: toFieldSpecifications(form.fields),
    });
    if (problems.length > 0) {
      throw new Error(`Invalid template ${entry.id}: ${problems.join('; ')}`);
    }

    return { id: entry.id, description: entry.description, form };
  });
}

export function formatValidationErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => `${path}: ${message}`);
    return [...own, ...formatValidationErrors(error.children ?? [], path)];
  });
}
