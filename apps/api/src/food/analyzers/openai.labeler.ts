import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import type { AppConfig } from '../../config/config.schema';
import { errorMessage } from '../../common/errors';
import { parseFoodNames } from './food-names.parser';
import { FOOD_PROMPT, type LabelerProvider } from './labeler.provider';

@Injectable()
export class OpenAILabeler implements LabelerProvider {
  private readonly logger = new Logger(OpenAILabeler.name);
  private openai?: OpenAI;

  constructor(private readonly configService: ConfigService<AppConfig, true>) {}

  async extractFoods(image: Buffer, mimeType: string): Promise<string[]> {
    const model = this.configService.get('OPENAI_MODEL', { infer: true });

    try {
      this.logger.debug('Extracting foods using OpenAI');

      const response = await this.getClient().chat.completions.create({
        model,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: FOOD_PROMPT },
              {
                type: 'image_url',
                image_url: { url: `data:${mimeType};base64,${image.toString('base64')}` },
              },
            ],
          },
        ],
        temperature: 0,
        max_tokens: 500,
      });

      const content = response.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new Error('No response content from OpenAI');
      }
      this.logger.debug(`OpenAI response: ${content}`);

      const foods = parseFoodNames(content);
      this.logger.debug(`Extracted ${foods.length} foods: ${foods.join(', ')}`);
      return foods;
    } catch (error) {
      this.logger.error(`Failed to extract foods with OpenAI: ${errorMessage(error)}`);
      throw new Error(`OpenAI request failed: ${errorMessage(error)}`);
    }
  }

  private getClient(): OpenAI {
    if (!this.openai) {
      const apiKey = this.configService.get('OPENAI_API_KEY', { infer: true });
      if (!apiKey) {
        throw new Error('OPENAI_API_KEY missing and OpenAI provider selected');
      }
      this.openai = new OpenAI({
        apiKey,
        timeout: this.configService.get('CLASSIFIER_TIMEOUT_MS', { infer: true }),
        maxRetries: 0,
      });
    }
    return this.openai;
  }
}
