import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import type { AppConfig } from '../config/config.schema';

import { FoodController } from './food.controller';
import { FoodAnalyzerService } from './food-analyzer.service';
import { LabelerModule } from './analyzers/labeler.module';
import { UsdaService } from './usda/usda.service';
import { NutrientResolver } from './nutrients/nutrient-resolver';
import { NutritionComposer } from './compose/nutrition-composer';

@Module({
  imports: [
    ConfigModule,
    MulterModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (cfg: ConfigService<AppConfig, true>) => ({
        limits: { fileSize: cfg.get('MAX_UPLOAD_BYTES', { infer: true }) },
      }),
    }),
    LabelerModule.forRoot(),
  ],
  controllers: [FoodController],
  providers: [FoodAnalyzerService, UsdaService, NutrientResolver, NutritionComposer],
  exports: [FoodAnalyzerService],
})
export class FoodModule {}
