/**
 * Sentry instrumentation. Imported first in main.ts so the SDK can hook
 * modules before they load. Reporting is enabled only when SENTRY_DSN is set.
 */
import * as Sentry from '@sentry/nestjs';
import * as os from 'os';

const dsn = process.env.SENTRY_DSN;
const isProduction = process.env.NODE_ENV === 'production';

if (dsn) {
  Sentry.init({
    dsn,
    environment: isProduction ? 'production' : 'development',
    tracesSampleRate: isProduction ? 0.1 : 1.0,
    beforeSend(event) {
      // Rate-limit rejections are expected traffic, not errors
      const exceptionType = event.exception?.values?.[0]?.type;
      if (exceptionType === 'ThrottlerException') {
        return null;
      }
      return event;
    },
    initialScope: {
      tags: {
        deployment: os.hostname(),
        component: 'maestros-api',
      },
    },
  });
}
