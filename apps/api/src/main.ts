import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { API_VERSION } from './app.service';
import type { AppConfig } from './config/config.schema';
import { CorrelationIdInterceptor } from './common/interceptors/correlation.interceptor';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const cfg = app.get<ConfigService<AppConfig, true>>(ConfigService);

  app.useGlobalInterceptors(new CorrelationIdInterceptor());

  app.enableCors({
    origin: '*',
    allowedHeaders: ['Content-Type', 'Authorization', 'x-correlation-id', 'x-corr-id'],
    exposedHeaders: ['x-correlation-id'],
    methods: ['GET', 'POST', 'OPTIONS'],
  });
  app.use(
    helmet({
      crossOriginResourcePolicy: false,
      contentSecurityPolicy: cfg.get('NODE_ENV', { infer: true }) === 'production' ? undefined : false,
    }),
  );

  const config = new DocumentBuilder()
    .setTitle('Nutrition Analysis API')
    .setDescription('Analyze food images and return nutritional information')
    .setVersion(API_VERSION)
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document);

  const port = cfg.get('PORT', { infer: true });
  await app.listen(port);
  new Logger('Bootstrap').log(`API http://localhost:${port}/health | Swagger http://localhost:${port}/docs`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
