import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { DatabaseService } from './database/database.service';

const logger = new Logger('Bootstrap');

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);

  app.setGlobalPrefix('api');
  app.useGlobalPipes(new ValidationPipe({ transform: true }));
  app.enableShutdownHooks();

  if (configService.get<string>('DB_SYNCHRONIZE') === 'true') {
    await app.get(DatabaseService).init();
  }

  const port = Number(configService.get<string>('PORT', '3000'));
  await app.listen(port);

  logger.log(`Product catalog listening on port ${port}`);
}

bootstrap().catch(error => {
  logger.error('Failed to start product catalog', error);
  process.exit(1);
});
