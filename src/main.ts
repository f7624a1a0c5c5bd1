import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);

  app.enableCors({
    origin: configService.get<string>('CORS_ORIGIN', '*'),
  });

  app.useGlobalPipes(new ValidationPipe());

  if (configService.get<string>('ENABLE_SWAGGER', 'true') !== 'false') {
    const config = new DocumentBuilder()
      .setTitle('Keyword Organizer API')
      .setDescription('Keyword search, autocomplete and folders over in-memory documents')
      .setVersion('1.0')
      .build();
    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup(configService.get<string>('DOCS_PATH', 'api'), app, document);
  }

  const port = Number(configService.get<string>('PORT', '3000'));
  const host = configService.get<string>('HOST', '0.0.0.0');

  await app.listen(port, host);
  logger.log(`Application is running on: ${await app.getUrl()}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start application', error);
  process.exit(1);
});
