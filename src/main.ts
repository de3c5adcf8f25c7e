import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { ConfigService } from '@nestjs/config';
import { Logger, ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { logConfigurationSummary } from './config/config.utils';
import type { ShardplaneConfiguration } from './config/config.types';

/**
 * BootStrap
 */
async function bootstrap() {
  const logger = new Logger('bootstrap');

  try {
    const isDevelopment = process.env.NODE_ENV === 'development';
    const app = await NestFactory.create<NestExpressApplication>(AppModule, {
      logger: isDevelopment ? ['log', 'error', 'warn', 'debug', 'verbose'] : ['log', 'error', 'warn'],
    });

    // Enable global validation pipe for DTO validation
    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true, // Strip properties not in DTO
        forbidNonWhitelisted: true, // Reject requests with extra properties
        transform: true, // Transform payloads to DTO instances
      }),
    );

    app.enableShutdownHooks();

    const config = app.get<ConfigService>(ConfigService);
    const httpPort = config.get<number>('shardplane.main.port');
    const environment = config.get<string>('shardplane.environment');

    const shutdown = async (signal: string) => {
      logger.log(`Received ${signal}, starting graceful shutdown`);
      try {
        await app.close();
        logger.log('Application closed successfully');
        process.exit(0);
      } catch (shutdownError) {
        const message = shutdownError instanceof Error ? shutdownError.message : String(shutdownError);
        const stack = shutdownError instanceof Error ? shutdownError.stack : undefined;
        logger.error(`Error during shutdown: ${message}`, stack);
        process.exit(1);
      }
    };

    const handleSignal = (signal: NodeJS.Signals) => {
      void shutdown(signal);
    };

    process.on('SIGTERM', handleSignal);
    process.on('SIGINT', handleSignal);

    if (environment === 'development') {
      logger.log(`RUNNING IN DEVELOPMENT MODE`);

      const shardplaneConfig = config.get<ShardplaneConfiguration>('shardplane');
      if (shardplaneConfig) {
        logConfigurationSummary(shardplaneConfig);
      }

      const swaggerConfig = new DocumentBuilder()
        .setTitle('Shardplane API')
        .setDescription('Converge, grow, shrink and inspect a coordinator + workers sharded Postgres cluster.')
        .setVersion('1.0')
        .addApiKey({ type: 'apiKey', name: 'X-API-Key', in: 'header' }, 'api-key')
        .build();
      const document = SwaggerModule.createDocument(app, swaggerConfig);
      SwaggerModule.setup('api-docs', app, document);
      logger.log('Swagger UI is available at /api-docs');
    }

    if (!httpPort) {
      logger.error('NO HTTP PORT CONFIGURED (SHP_SERVER_PORT)');
      return;
    }

    await app.listen(httpPort);
    logger.log(`Shardplane is ready on port ${httpPort}`);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorStack = error instanceof Error ? error.stack : undefined;
    logger.error(`Failed to bootstrap application: ${errorMessage}`, errorStack);
    process.exit(1);
  }
}
bootstrap().catch((error) => {
  const logger = new Logger('bootstrap');
  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.error(`Unhandled bootstrap error: ${errorMessage}`);
  process.exit(1);
});
