/**
 * Content Decay Auditor API
 * Compares Search Console clicks per page against the same window a year earlier
 */

import 'reflect-metadata';
import * as dotenv from 'dotenv';
dotenv.config(); // Load .env file

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app/app.module';
import { DecayAuditExceptionFilter } from './filters/decay-audit-exception.filter';
import { environment } from './environments/environment';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  // Set global API prefix
  const globalPrefix = 'api';
  app.setGlobalPrefix(globalPrefix);
  app.useGlobalFilters(new DecayAuditExceptionFilter());

  app.enableCors({
    origin: environment.frontendUrl,
    methods: ['GET', 'DELETE'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });

  const port = environment.port;

  await app.listen(port);

  Logger.log(
    `Content Decay Auditor API is running on: http://localhost:${port}/${globalPrefix}`
  );
  Logger.log(`Environment: ${environment.production ? 'production' : 'development'}`);
  Logger.log(
    `Windows: ${environment.dateWindows.windowLengthDays} days, ` +
      `lag ${environment.dateWindows.reportLagDays}, offset ${environment.dateWindows.yoyOffsetDays}`
  );
  Logger.log(`Decline threshold: ${environment.decay.thresholds.minPctDecline}%`);
}

bootstrap().catch((error: unknown) => {
  Logger.error('Failed to start Content Decay Auditor API', error);
  process.exit(1);
});
