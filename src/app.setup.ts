import { INestApplication, ValidationPipe } from '@nestjs/common';
import { validationExceptionFactory } from './common/validation/validation-exception.factory';

/**
 * Global pipes and routing shared by the server and the HTTP tests
 */
export function configureApp(app: INestApplication): INestApplication {
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
      exceptionFactory: validationExceptionFactory,
    }),
  );

  app.setGlobalPrefix('api');

  return app;
}
