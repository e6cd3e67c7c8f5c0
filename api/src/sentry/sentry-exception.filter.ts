import {
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { ExceptionFilter } from '@nestjs/common';
import * as Sentry from '@sentry/nestjs';
import type { Response } from 'express';

/**
 * Global exception filter. Sends HttpExceptions through unchanged, turns
 * anything else into a generic 500, and reports server-side failures to
 * Sentry (a no-op when Sentry was never initialised).
 *
 * Registered with `app.useGlobalFilters(new ...)`, outside DI, so it cannot
 * extend BaseExceptionFilter (which needs HttpAdapterHost).
 */
@Catch()
export class SentryExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger('ExceptionFilter');

  catch(exception: unknown, host: ArgumentsHost): void {
    if (host.getType() === 'http') {
      const response = host.switchToHttp().getResponse<Response>();

      if (response.headersSent) {
        return;
      }

      if (exception instanceof HttpException) {
        const status = exception.getStatus();
        const body = exception.getResponse();

        if (status >= 500) {
          Sentry.captureException(exception);
        }

        response
          .status(status)
          .json(
            typeof body === 'string'
              ? { statusCode: status, message: body }
              : body,
          );
      } else {
        this.logger.error('Unhandled exception:', exception);
        Sentry.captureException(exception);
        response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
          statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
          message: 'Internal server error',
        });
      }
      return;
    }

    // Non-HTTP context (lifecycle hooks, schedulers)
    Sentry.captureException(exception);
    throw exception;
  }
}
