import { Catch } from '@nestjs/common';
import type { ArgumentsHost, ExceptionFilter } from '@nestjs/common';
import { ThrottlerException } from '@nestjs/throttler';
import type { Response } from 'express';

/** Shapes throttler rejections into a fixed 429 body. */
@Catch(ThrottlerException)
export class ThrottlerExceptionFilter implements ExceptionFilter {
  catch(_exception: ThrottlerException, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();

    res.status(429).json({
      statusCode: 429,
      message: 'Rate limit exceeded. Try again in a minute.',
      retryAfter: 60,
    });
  }
}
