import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import type { AppConfig } from '../../config/config.schema';
import { errorMessage } from '../../common/errors';
import { parseFoodNames } from './food-names.parser';
import { FOOD_PROMPT, type LabelerProvider } from './labeler.provider';

@Injectable()
export class GeminiLabeler implements LabelerProvider {
  private readonly logger = new Logger(GeminiLabeler.name);
  private model?: GenerativeModel;

  constructor(private readonly configService: ConfigService<AppConfig, true>) {}

  async extractFoods(image: Buffer, mimeType: string): Promise<string[]> {
    try {
      this.logger.debug('Extracting foods using Gemini');

      const response = await this.getModel().generateContent([
        FOOD_PROMPT,
        { inlineData: { data: image.toString('base64'), mimeType } },
      ]);

      const text = response.response.text().trim();
      if (!text) {
        throw new Error('No response content from Gemini');
      }
      this.logger.debug(`Gemini response: ${text}`);

      const foods = parseFoodNames(text);
      this.logger.debug(`Extracted ${foods.length} foods: ${foods.join(', ')}`);
      return foods;
    } catch (error) {
      this.logger.error(`Failed to extract foods with Gemini: ${errorMessage(error)}`);
      throw new Error(`Gemini request failed: ${errorMessage(error)}`);
    }
  }

  // defer client construction until first use
  private getModel(): GenerativeModel {
    if (!this.model) {
      const apiKey = this.configService.get('GEMINI_API_KEY', { infer: true });
      if (!apiKey) {
        throw new Error('GEMINI_API_KEY missing and Gemini provider selected');
      }
      this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel(
        { model: this.configService.get('GEMINI_MODEL', { infer: true }) },
        { timeout: this.configService.get('CLASSIFIER_TIMEOUT_MS', { infer: true }) },
      );
    }
    return this.model;
  }
}
