import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import helmet from 'helmet';
import { AppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);

  // Inline styles in the display page need 'unsafe-inline'
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          styleSrc: ["'self'", "'unsafe-inline'"],
        },
      },
    }),
  );

  app.enableCors({
    origin: process.env.FRONTEND_URL ?? false,
    credentials: true,
  });

  app.useGlobalPipes(new ValidationPipe({
    whitelist: true,
    transform: true,
  }));

  app.enableShutdownHooks();

  const port = process.env.PORT || 3667;
  await app.listen(port);
  logger.log(`Stock monitor API running on port ${port}`);
}

bootstrap().catch((error: Error) => {
  new Logger('Bootstrap').error(`Startup failed: ${error.message}`, error.stack);
  process.exit(1);
});
