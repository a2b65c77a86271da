import { Controller, Get } from '@nestjs/common';
import { AppService } from './app.service';

// Liveness only; touches neither the classifier nor USDA.
@Controller('health')
export class HealthController {
  constructor(private readonly app: AppService) {}

  @Get()
  get() {
    return this.app.health();
  }
}
