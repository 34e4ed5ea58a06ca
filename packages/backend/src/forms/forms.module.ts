import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { FormConfigurationEntity } from '../database/entities/form-configuration.entity';
import { CONFIGURATION_STORE } from '../intake/provider.interfaces';
import { FormsController } from './forms.controller';
import { FormsService } from './forms.service';
import { TemplatesService } from './templates.service';

@Module({
  imports: [TypeOrmModule.forFeature([FormConfigurationEntity])],
  controllers: [FormsController],
  providers: [
    FormsService,
    TemplatesService,
    { provide: CONFIGURATION_STORE, useExisting: FormsService },
  ],
  exports: [FormsService, CONFIGURATION_STORE],
})
export class FormsModule {}
