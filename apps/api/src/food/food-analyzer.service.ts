import { Inject, Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { errorMessage } from '../common/errors';
import { LABELER_PROVIDER, type LabelerProvider } from './analyzers/labeler.provider';
import { NutrientResolver } from './nutrients/nutrient-resolver';
import { NutritionComposer } from './compose/nutrition-composer';
import { emptyNutrition, type AnalysisResult, type FoodItem } from './nutrition.types';

@Injectable()
export class FoodAnalyzerService {
  private readonly logger = new Logger(FoodAnalyzerService.name);

  constructor(
    private readonly nutrientResolver: NutrientResolver,
    private readonly nutritionComposer: NutritionComposer,
    @Inject(LABELER_PROVIDER) private readonly labeler: LabelerProvider,
  ) {}

  async analyze(image: Buffer, mimeType: string): Promise<AnalysisResult> {
    const startTime = Date.now();

    const names = await this.detectFoods(image, mimeType);
    this.logger.log(`Foods detected: ${names.length ? names.join(', ') : '(none)'}`);

    if (names.length === 0) {
      return { success: true, foods: [], total: emptyNutrition() };
    }

    // lookups are independent and never reject
    const foods: FoodItem[] = await Promise.all(
      names.map(async (name) => ({ name, nutrition: await this.nutrientResolver.resolve(name) })),
    );

    const total = this.nutritionComposer.total(foods);

    this.logger.log(`Completed analysis of ${foods.length} foods in ${Date.now() - startTime}ms`);
    return { success: true, foods, total };
  }

  private async detectFoods(image: Buffer, mimeType: string): Promise<string[]> {
    try {
      return await this.labeler.extractFoods(image, mimeType);
    } catch (error) {
      this.logger.error(`Error detecting foods: ${errorMessage(error)}`);
      throw new InternalServerErrorException({ detail: `Food detection failed: ${errorMessage(error)}` });
    }
  }
}
