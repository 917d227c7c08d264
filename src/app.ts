import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import compress from '@fastify/compress';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import * as Sentry from '@sentry/node';
import { ZodError } from 'zod';
import lotRoutes from './routes/lotRoutes';
import { config } from './config/env';
import { defaultRuleSet, loadRuleSet, type RuleSet } from './config/ruleSet';

export type BuildAppOptions = {
  ruleSet?: RuleSet;
};

function errorCode(error: Error): string {
  return 'code' in error && typeof error.code === 'string' ? error.code : 'INTERNAL_ERROR';
}

export function resolveRuleSet(): RuleSet {
  return config.RULE_SET_PATH ? loadRuleSet(config.RULE_SET_PATH) : defaultRuleSet;
}

export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const ruleSet = options.ruleSet ?? resolveRuleSet();

  const app = Fastify({
    trustProxy: true,
    // Batches of several thousand descriptions exceed the 1 MiB default.
    bodyLimit: 10 * 1024 * 1024,
    logger: {
      level: config.LOG_LEVEL,
      transport:
        config.NODE_ENV === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            }
          : undefined,
      redact: ['req.headers.authorization', 'req.headers.cookie'],
    },
  });

  // Security Headers
  app.register(helmet, {
    contentSecurityPolicy: config.NODE_ENV === 'production',
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  // Rate Limiting
  if (config.ENABLE_RATE_LIMIT === 'true') {
    app.register(rateLimit, {
      max: 100,
      timeWindow: '1 minute',
    });
  }

  app.register(compress, { global: true });

  // Setup Zod validation
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.register(cors, {
    origin: config.NODE_ENV !== 'production',
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  });

  app.register(lotRoutes, { prefix: '/lots', ruleSet });

  // Health Check
  app.get('/health', async () => {
    return { status: 'ok', ruleSet: ruleSet.name };
  });

  // Global Error Handler
  app.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode || 500;
    const code = errorCode(error);

    if (statusCode >= 500) {
      request.log.error(error);
      Sentry.withScope((scope) => {
        scope.setContext('request', {
          method: request.method,
          url: request.url,
        });
        scope.setTag('error_code', code);
        scope.setTag('status_code', String(statusCode));
        Sentry.captureException(error);
      });
    } else {
      request.log.warn({ code, message: error.message }, 'Request rejected');
    }

    // The zod validator compiler surfaces a ZodError rather than fastify's `validation` array.
    if (error instanceof ZodError || error.validation) {
      return reply.status(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: error instanceof ZodError ? error.issues : error.validation,
        },
      });
    }

    return reply.status(statusCode).send({
      error: {
        code,
        message: error.message || 'Something went wrong',
      },
    });
  });

  return app;
}
