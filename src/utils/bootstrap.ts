import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppService } from '../app.service';
import { EnvironmentVariables } from '../config/env.validation';

export function createApplication(app: INestApplication) {
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();
  return app;
}

export function documentationBuilder(
  app: INestApplication,
  configService: ConfigService<EnvironmentVariables, true>,
) {
  const config = new DocumentBuilder()
    .setTitle(configService.get('APP_NAME', { infer: true }))
    .setDescription('Control a Minecraft Bedrock server running in Docker')
    .setVersion(app.get(AppService).getVersion())
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document);
}
