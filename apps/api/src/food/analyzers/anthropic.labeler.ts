import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Anthropic from '@anthropic-ai/sdk';
import type { AppConfig } from '../../config/config.schema';
import { errorMessage } from '../../common/errors';
import { parseFoodNames } from './food-names.parser';
import { FOOD_PROMPT, type LabelerProvider } from './labeler.provider';

const SUPPORTED_MEDIA_TYPES = ['image/jpeg', 'image/png', 'image/gif', 'image/webp'] as const;
type SupportedMediaType = (typeof SUPPORTED_MEDIA_TYPES)[number];

function isSupportedMediaType(mimeType: string): mimeType is SupportedMediaType {
  return SUPPORTED_MEDIA_TYPES.some((t) => t === mimeType);
}

@Injectable()
export class AnthropicLabeler implements LabelerProvider {
  private readonly logger = new Logger(AnthropicLabeler.name);
  private anthropic?: Anthropic;

  constructor(private readonly configService: ConfigService<AppConfig, true>) {}

  async extractFoods(image: Buffer, mimeType: string): Promise<string[]> {
    const model = this.configService.get('ANTHROPIC_MODEL', { infer: true });

    try {
      if (!isSupportedMediaType(mimeType)) {
        throw new Error(`unsupported media type ${mimeType}`);
      }
      this.logger.debug('Extracting foods using Anthropic');

      const response = await this.getClient().messages.create({
        model,
        max_tokens: 512,
        temperature: 0,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'image', source: { type: 'base64', media_type: mimeType, data: image.toString('base64') } },
              { type: 'text', text: FOOD_PROMPT },
            ],
          },
        ],
      });

      const block = response.content.find((b) => b.type === 'text');
      const text = block && block.type === 'text' ? block.text.trim() : '';
      if (!text) {
        throw new Error('No response content from Anthropic');
      }
      this.logger.debug(`Anthropic response: ${text}`);

      const foods = parseFoodNames(text);
      this.logger.debug(`Extracted ${foods.length} foods: ${foods.join(', ')}`);
      return foods;
    } catch (error) {
      this.logger.error(`Failed to extract foods with Anthropic: ${errorMessage(error)}`);
      throw new Error(`Anthropic request failed: ${errorMessage(error)}`);
    }
  }

  private getClient(): Anthropic {
    if (!this.anthropic) {
      const apiKey = this.configService.get('ANTHROPIC_API_KEY', { infer: true });
      if (!apiKey) {
        throw new Error('ANTHROPIC_API_KEY missing and Anthropic provider selected');
      }
      this.anthropic = new Anthropic({
        apiKey,
        timeout: this.configService.get('CLASSIFIER_TIMEOUT_MS', { infer: true }),
        maxRetries: 0,
      });
    }
    return this.anthropic;
  }
}
