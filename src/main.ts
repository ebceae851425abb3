import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, type NestFastifyApplication } from '@nestjs/platform-fastify';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { Logger, ValidationPipe } from '@nestjs/common';
import { AppModule } from './app.module.js';
import { APP_CONFIG, type AppConfig } from './config/app-config.js';

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter(), {
    logger: ['error', 'warn', 'log', 'debug', 'verbose'],
  });

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  const config = new DocumentBuilder()
    .setTitle('Repo Vault API')
    .setDescription('Crash-safe backup and restore of GitHub repositories')
    .setVersion('1.0.0')
    .addApiKey({ type: 'apiKey', name: 'X-API-Key', in: 'header' }, 'X-API-Key')
    .build();

  const doc = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, doc);

  const { http, backupDir } = app.get<AppConfig>(APP_CONFIG);
  await app.listen(http.port, http.host);

  const logger = new Logger('Bootstrap');
  const authStatus = http.nodeEnv === 'production' ? '🔒 API Key Required' : '🔓 Open Access';
  logger.log(`📚 Swagger documentation: http://${http.host}:${http.port}/docs`);
  logger.log(`🗄️ Backup root: ${backupDir}`);
  logger.log(`🌍 Environment: ${http.nodeEnv}`);
  logger.log(`🔐 Authentication: ${authStatus}`);
}
bootstrap().catch((err: unknown) => {
  console.error('Application failed to start:', err);
  process.exit(1);
});
