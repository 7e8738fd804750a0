import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { EnvironmentVariables } from './config/env.validation';
import { createApplication, documentationBuilder } from './utils/bootstrap';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  createApplication(app);
  const configService = app.get<
    ConfigService,
    ConfigService<EnvironmentVariables, true>
  >(ConfigService);
  documentationBuilder(app, configService);

  const host = configService.get('APP_HOST', { infer: true });
  const port = configService.get('APP_PORT', { infer: true });
  await app.listen(port, host);
  new Logger('Bootstrap').log(`Listening on http://${host}:${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error);
  process.exit(1);
});
