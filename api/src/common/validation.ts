import { BadRequestException } from '@nestjs/common';
import { ZodError } from 'zod';

/**
 * Converts a zod failure into a 400 listing every issue as `path: message`.
 * Anything else is rethrown untouched.
 */
export function handleValidationError(error: unknown): never {
  if (error instanceof ZodError) {
    throw new BadRequestException({
      message: 'Validation failed',
      errors: error.issues.map((e) =>
        e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message,
      ),
    });
  }
  throw error;
}
