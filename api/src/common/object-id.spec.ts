import { BadRequestException } from '@nestjs/common';
import { parseObjectId, snowflakeCreatedAt } from './object-id';

describe('parseObjectId', () => {
  it('accepts 24-character hex ids', () => {
    expect(parseObjectId('65f000000000000000000001', 'Invalid ID').toHexString()).toBe(
      '65f000000000000000000001',
    );
  });

  it('rejects anything else with the given message', () => {
    expect(() => parseObjectId('not-an-id', 'Invalid event ID')).toThrow(
      new BadRequestException('Invalid event ID'),
    );
  });
});

describe('snowflakeCreatedAt', () => {
  it('decodes the timestamp bits', () => {
    // 1 << 22 is one millisecond after the Discord epoch
    expect(snowflakeCreatedAt('4194304')?.toISOString()).toBe(
      '2015-01-01T00:00:00.001Z',
    );
  });

  it('returns null for non-numeric ids', () => {
    expect(snowflakeCreatedAt('abc')).toBeNull();
  });
});
