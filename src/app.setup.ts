import { INestApplication, ValidationPipe } from '@nestjs/common';
import {
  ApplicationExceptionFilter,
  DomainExceptionFilter,
  RepositoryExceptionFilter,
  ValidationExceptionFilter,
  requestValidationExceptionFactory,
} from '@common/exception';

/**
 * 전역 예외 필터와 ValidationPipe 설정 (main, e2e 테스트 공용)
 */
export function configureApp(app: INestApplication): INestApplication {
  // Global Exception Filters
  app.useGlobalFilters(
    new DomainExceptionFilter(),
    new ApplicationExceptionFilter(),
    new RepositoryExceptionFilter(),
    new ValidationExceptionFilter(),
  );

  // Global Validation Pipe
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
      exceptionFactory: requestValidationExceptionFactory,
    }),
  );

  return app;
}
