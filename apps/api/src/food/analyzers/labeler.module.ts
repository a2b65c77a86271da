import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import type { AppConfig } from '../../config/config.schema';
import { LABELER_PROVIDER, type LabelerProvider } from './labeler.provider';
import { GeminiLabeler } from './gemini.labeler';
import { OpenAILabeler } from './openai.labeler';
import { AnthropicLabeler } from './anthropic.labeler';

@Module({ imports: [ConfigModule] })
export class LabelerModule {
  static forRoot(): DynamicModule {
    const labelerFactory: Provider = {
      provide: LABELER_PROVIDER,
      inject: [ConfigService],
      useFactory: (cfg: ConfigService<AppConfig, true>): LabelerProvider => {
        switch (cfg.get('CLASSIFIER_PROVIDER', { infer: true })) {
          case 'openai':
            return new OpenAILabeler(cfg);
          case 'anthropic':
            return new AnthropicLabeler(cfg);
          case 'gemini':
          default:
            return new GeminiLabeler(cfg);
        }
      },
    };

    return {
      module: LabelerModule,
      imports: [ConfigModule],
      providers: [labelerFactory],
      exports: [LABELER_PROVIDER],
    };
  }
}
