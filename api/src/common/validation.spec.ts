import { BadRequestException, NotFoundException } from '@nestjs/common';
import { z } from 'zod';
import { handleValidationError } from './validation';

describe('handleValidationError', () => {
  it('lists each zod issue with its path', () => {
    const schema = z.object({ title: z.string().min(5, 'Too short') });
    const result = schema.safeParse({ title: 'abc' });
    if (result.success) throw new Error('expected failure');

    let caught: unknown;
    try {
      handleValidationError(result.error);
    } catch (e) {
      caught = e;
    }

    expect(caught).toBeInstanceOf(BadRequestException);
    if (caught instanceof BadRequestException) {
      expect(caught.getResponse()).toEqual({
        message: 'Validation failed',
        errors: ['title: Too short'],
      });
    }
  });

  it('rethrows other errors unchanged', () => {
    const error = new NotFoundException('Event not found');
    expect(() => handleValidationError(error)).toThrow(error);
  });
});
