import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { LoggerService } from './logger/logger.service';
import { RequestIdMiddleware } from './logger/request-id.middleware';
import { ApiExceptionFilter } from './common/filters/api-exception.filter';
import { createValidationPipe } from './common/pipes/validation.pipe';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  });

  const logger = await app.resolve(LoggerService);
  logger.setContext('Bootstrap');
  app.useLogger(logger);

  const requestId = new RequestIdMiddleware();
  app.use(requestId.use.bind(requestId));

  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new ApiExceptionFilter(await app.resolve(LoggerService)));
  app.enableShutdownHooks();

  const port = process.env.PORT || 3000;
  await app.listen(port);
  logger.log(`Gateway is listening on: http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  console.error('Gateway failed to start', error);
  process.exit(1);
});
