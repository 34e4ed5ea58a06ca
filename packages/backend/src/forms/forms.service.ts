import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { isUUID } from 'class-validator';
import { FormConfigurationEntity } from '../database/entities/form-configuration.entity';
import { validateFormConfiguration } from '../intake/configuration.validator';
import { FormNotFoundError } from '../intake/intake.errors';
import { ConfigurationStore, StoredConfiguration } from '../intake/provider.interfaces';
import { CreateFormDto, UpdateFormDto } from './dto/form.dto';
import {
  toAgentPersona,
  toBusinessProfile,
  toFieldSpecifications,
  toStoredConfiguration,
} from './forms.mapper';
import { TemplatesService } from './templates.service';

/**
 * Form configuration CRUD. Every write is checked with
 * validateFormConfiguration before it reaches the database.
 */
@Injectable()
export class FormsService implements ConfigurationStore {
  private readonly logger = new Logger(FormsService.name);

  constructor(
    @InjectRepository(FormConfigurationEntity)
    private readonly formRepository: Repository<FormConfigurationEntity>,
    private readonly templatesService: TemplatesService,
  ) {}

  async create(dto: CreateFormDto): Promise<StoredConfiguration> {
    const entity = this.formRepository.create({
      name: dto.name.trim(),
      industry: dto.industry,
      business: toBusinessProfile(dto.business),
      agent: toAgentPersona(dto.agent),
      fields: toFieldSpecifications(dto.fields),
      isActive: dto.isActive,
    });
    validateFormConfiguration(entity);

    const saved = await this.formRepository.save(entity);
    this.logger.log(`Created form ${saved.id} (${saved.name}, ${saved.fields.length} fields)`);
    return toStoredConfiguration(saved);
  }

  async createFromTemplate(industry: string, businessName: string): Promise<StoredConfiguration> {
    const { form } = this.templatesService.get(industry);
    const created = await this.create({
      ...form,
      business: { ...form.business, name: businessName },
    });
    this.logger.log(`Created form ${created.id} from the ${industry} template`);
    return created;
  }

  async findAll(): Promise<StoredConfiguration[]> {
    const entities = await this.formRepository.find({ order: { createdAt: 'DESC' } });
    return entities.map(toStoredConfiguration);
  }

  async findOne(id: string): Promise<StoredConfiguration> {
    return toStoredConfiguration(await this.findEntity(id));
  }

  async getConfiguration(id: string): Promise<StoredConfiguration> {
    return this.findOne(id);
  }

  async update(id: string, dto: UpdateFormDto): Promise<StoredConfiguration> {
    const entity = await this.findEntity(id);

    if (dto.name !== undefined) {
      entity.name = dto.name.trim();
    }
    if (dto.industry !== undefined) {
      entity.industry = dto.industry;
    }
    if (dto.business) {
      entity.business = toBusinessProfile(dto.business);
    }
    if (dto.agent) {
      entity.agent = toAgentPersona(dto.agent);
    }
    if (dto.fields) {
      entity.fields = toFieldSpecifications(dto.fields);
    }
    if (dto.isActive !== undefined) {
      entity.isActive = dto.isActive;
    }

    validateFormConfiguration(entity);
    const saved = await this.formRepository.save(entity);
    this.logger.log(`Updated form ${id}`);
    return toStoredConfiguration(saved);
  }

  async remove(id: string): Promise<void> {
    const entity = await this.findEntity(id);
    await this.formRepository.remove(entity);
    this.logger.log(`Deleted form ${id}`);
  }

  private async findEntity(id: string): Promise<FormConfigurationEntity> {
    if (!isUUID(id)) {
      throw new FormNotFoundError(id);
    }
    const entity = await this.formRepository.findOne({ where: { id } });
    if (!entity) {
      throw new FormNotFoundError(id);
    }
    return entity;
  }
}
