import 'reflect-metadata';
import dotenv from 'dotenv';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { join } from 'path';
import { AppModule } from './app.module';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import { ConfigurationError } from './common/errors/configuration.error';
import { DashboardConfig, loadDashboardConfig } from './config/dashboard.config';

const logger = new Logger('Bootstrap');

async function bootstrap(config: DashboardConfig): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule.forRoot(config));

  app.enableCors();
  app.useGlobalFilters(new AllExceptionsFilter());
  app.useStaticAssets(join(__dirname, '..', 'public'));
  app.enableShutdownHooks();

  await app.listen(config.port);
  logger.log(`Dashboard listening on port ${config.port}, upstream ${config.upstream.host}`);
}

function main(): void {
  dotenv.config();

  let config: DashboardConfig;
  try {
    config = loadDashboardConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`Configuration error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  bootstrap(config).catch((error: unknown) => {
    logger.error('Failed to start', error instanceof Error ? error.stack : String(error));
    process.exit(1);
  });
}

main();
