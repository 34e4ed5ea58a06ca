import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { FIELD_TYPE_INFO, INDUSTRY_LABELS, TONE_INFO, VOICE_INFO } from '../intake/field-catalog';
import { FormConfiguration } from '../intake/intake.types';
import { StoredConfiguration } from '../intake/provider.interfaces';
import { CreateFormDto, FromTemplateQueryDto, UpdateFormDto } from './dto/form.dto';
import { FormsService } from './forms.service';
import { TemplateInfo, TemplatesService } from './templates.service';

export interface MetaOption {
  value: string;
  label: string;
  description?: string;
}

/**
 * Form configuration API: CRUD, industry templates and the option lists a
 * form builder needs.
 */
@ApiTags('forms')
@Controller('api/forms')
export class FormsController {
  constructor(
    private readonly formsService: FormsService,
    private readonly templatesService: TemplatesService,
  ) {}

  // Templates

  @Get('templates')
  @ApiOperation({ summary: 'List industry templates' })
  listTemplates(): TemplateInfo[] {
    return this.templatesService.list();
  }

  @Get('templates/:industry')
  @ApiOperation({ summary: 'Get the template for an industry' })
  getTemplate(@Param('industry') industry: string): FormConfiguration {
    return this.templatesService.preview(industry);
  }

  @Post('from-template/:industry')
  @ApiOperation({ summary: 'Create a form from an industry template' })
  @ApiQuery({ name: 'businessName', required: true })
  createFromTemplate(
    @Param('industry') industry: string,
    @Query() query: FromTemplateQueryDto,
  ): Promise<StoredConfiguration> {
    return this.formsService.createFromTemplate(industry, query.businessName);
  }

  // Metadata

  @Get('meta/field-types')
  getFieldTypes(): MetaOption[] {
    return Object.entries(FIELD_TYPE_INFO).map(([value, info]) => ({
      value,
      label: info.label,
      description: info.description,
    }));
  }

  @Get('meta/industries')
  getIndustries(): MetaOption[] {
    return Object.entries(INDUSTRY_LABELS).map(([value, label]) => ({ value, label }));
  }

  @Get('meta/tones')
  getTones(): MetaOption[] {
    return Object.entries(TONE_INFO).map(([value, info]) => ({
      value,
      label: info.label,
      description: info.description,
    }));
  }

  @Get('meta/voices')
  getVoices(): MetaOption[] {
    return Object.entries(VOICE_INFO).map(([value, info]) => ({
      value,
      label: info.label,
      description: info.description,
    }));
  }

  // CRUD

  @Get()
  @ApiOperation({ summary: 'List form configurations' })
  findAll(): Promise<StoredConfiguration[]> {
    return this.formsService.findAll();
  }

  @Post()
  @ApiOperation({ summary: 'Create a form configuration' })
  create(@Body() dto: CreateFormDto): Promise<StoredConfiguration> {
    return this.formsService.create(dto);
  }

  @Get(':id')
  findOne(@Param('id') id: string): Promise<StoredConfiguration> {
    return this.formsService.findOne(id);
  }

  @Put(':id')
  update(@Param('id') id: string, @Body() dto: UpdateFormDto): Promise<StoredConfiguration> {
    return this.formsService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.OK)
  async remove(@Param('id') id: string): Promise<{ message: string }> {
    await this.formsService.remove(id);
    return { message: `Form ${id} deleted` };
  }
}
