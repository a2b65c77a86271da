import { Injectable } from '@nestjs/common';

export const SERVICE_NAME = 'nutrition-analysis-api';
export const API_VERSION = '1.0.0';

@Injectable()
export class AppService {
  root() {
    return { message: 'Nutrition Analysis API is running', version: API_VERSION };
  }

  health() {
    return { status: 'healthy', service: SERVICE_NAME };
  }
}
