import { Module } from '@nestjs/common';
import { FormsModule } from '../forms/forms.module';
import { AnthropicProvider } from '../providers/anthropic.provider';
import { SessionsModule } from '../sessions/sessions.module';
import { DynamicAgentService } from './dynamic-agent.service';
import { ExtractorService } from './extractor.service';
import { ProviderRetryService } from './provider-retry.service';
import {
  STRUCTURED_EXTRACTION_PROVIDER,
  TEXT_GENERATION_PROVIDER,
} from './provider.interfaces';

/**
 * Dynamic agent, extractor and their provider bindings
 */
@Module({
  imports: [FormsModule, SessionsModule],
  providers: [
    AnthropicProvider,
    { provide: TEXT_GENERATION_PROVIDER, useExisting: AnthropicProvider },
    { provide: STRUCTURED_EXTRACTION_PROVIDER, useExisting: AnthropicProvider },
    ProviderRetryService,
    ExtractorService,
    DynamicAgentService,
  ],
  exports: [DynamicAgentService, AnthropicProvider],
})
export class IntakeModule {}
