import {
  BadRequestException,
  Controller,
  HttpCode,
  HttpException,
  HttpStatus,
  InternalServerErrorException,
  Logger,
  Post,
  Req,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import type { Request } from 'express';
import { errorMessage } from '../common/errors';
import type { CorrelatedRequest } from '../common/interceptors/correlation.interceptor';
import { FoodAnalyzerService } from './food-analyzer.service';
import { toNutritionResponse, type NutritionResponse } from './food.dto';

@Controller()
export class FoodController {
  private readonly logger = new Logger(FoodController.name);

  constructor(private readonly analyzer: FoodAnalyzerService) {}

  /** Multipart field `file`: a JPEG/PNG/... photo of a meal. */
  @Post('analyze-food')
  @UseInterceptors(FileInterceptor('file'))
  @HttpCode(HttpStatus.OK)
  async analyze(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Req() req: Request & CorrelatedRequest,
  ): Promise<NutritionResponse> {
    const image = this.validateFile(file);

    try {
      this.logger.log(
        `Received image: ${image.originalname}, size: ${image.buffer.length} bytes [${req.correlationId ?? '-'}]`,
      );
      const result = await this.analyzer.analyze(image.buffer, image.mimetype);
      return toNutritionResponse(result);
    } catch (error) {
      if (error instanceof HttpException) throw error;
      this.logger.error(`Error analyzing food image: ${errorMessage(error)}`);
      throw new InternalServerErrorException({ detail: `Internal server error: ${errorMessage(error)}` });
    }
  }

  private validateFile(file: Express.Multer.File | undefined): Express.Multer.File {
    if (!file) {
      throw new BadRequestException({ detail: 'No file uploaded' });
    }
    if (!file.mimetype || !file.mimetype.startsWith('image/')) {
      throw new BadRequestException({ detail: 'File must be an image' });
    }
    if (!file.buffer?.length) {
      throw new BadRequestException({ detail: 'Empty image file' });
    }
    return file;
  }
}
