import * as Sentry from '@sentry/serverless';

Sentry.AWSLambda.init({
  dsn: process.env.SENTRY_DSN,
  environment: process.env.SENTRY_ENVIRONMENT || process.env.NODE_ENV || 'development',
  tracesSampleRate: 1.0,
});

Sentry.setTag('service', 'movie-catalog');

export const withSentryLambda = Sentry.AWSLambda.wrapHandler;

export function withSpan<T>(name: string, op: string, fn: () => Promise<T>): Promise<T> {
  return Sentry.startSpan({ name, op }, () => fn());
}

export { Sentry };
