import type { INestApplication } from '@nestjs/common';
import { ApiExceptionFilter } from './common/filters/api-exception.filter';

/** Shared by the server entry point and the e2e tests. */
export function configureApp(app: INestApplication) {
  app.useGlobalFilters(new ApiExceptionFilter());
  app.setGlobalPrefix('api/v1');
  return app;
}
