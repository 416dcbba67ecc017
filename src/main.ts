import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { errorMessage } from './common/errors';
import { loadConfig } from './config/app-config';

async function bootstrap() {
  const config = loadConfig(process.env);
  const app = await NestFactory.create(AppModule.register(config), {
    logger: [...config.logLevels],
    abortOnError: false,
  });
  app.enableCors({ origin: config.corsOrigin });
  app.enableShutdownHooks();

  await app.listen(config.port);
  Logger.log(
    `Contracts dashboard API listening on :${config.port}`,
    'Bootstrap',
  );
}

bootstrap().catch((err: unknown) => {
  Logger.error(`Startup failed: ${errorMessage(err)}`, undefined, 'Bootstrap');
  process.exit(1);
});
