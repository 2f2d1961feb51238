import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);
  const logger = new Logger('Bootstrap');

  const config = new DocumentBuilder()
    .setTitle('Now Live Tracker API')
    .setDescription('Manage the Twitch streamers announced in Discord')
    .setVersion('1.0')
    .addTag('now-live')
    .addTag('health')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  app.useGlobalPipes(new ValidationPipe({ whitelist: true }));

  // SIGTERM / SIGINT run the tracker's shutdown: final save and lifecycle events
  app.enableShutdownHooks();

  const port = configService.get<string>('PORT') ?? '8080';

  await app.listen(port, '0.0.0.0');
  logger.log(`🚀 Application is running on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`❌ Failed to start: ${error instanceof Error ? error.stack : String(error)}`);
  process.exit(1);
});
