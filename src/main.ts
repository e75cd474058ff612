import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { ValidationPipe, VersioningType } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import helmet from 'helmet';
import compression from 'compression';
import * as Sentry from '@sentry/node';
import { randomUUID } from 'crypto';
import { Logger } from 'nestjs-pino';
import { Request, Response, NextFunction } from 'express';
import { AppModule } from './app.module';
import { RequestContextService } from './common/context/request-context.service';
import { ResponseInterceptor } from './common/interceptors/response.interceptor';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';

if (process.env.SENTRY_DSN) {
  Sentry.init({
    dsn: process.env.SENTRY_DSN,
    tracesSampleRate: parseFloat(process.env.SENTRY_TRACES_SAMPLE_RATE || '0.2'),
    environment: process.env.NODE_ENV,
  });
}

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
  });
  const configService = app.get(ConfigService);
  const logger = app.get(Logger);
  app.useLogger(logger);
  app.enableShutdownHooks();

  const context = app.get(RequestContextService);
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-correlation-id'];
    const correlationId = (typeof header === 'string' && header) || randomUUID();
    req.headers['x-correlation-id'] = correlationId;
    res.setHeader('x-correlation-id', correlationId);
    context.run(next, { correlationId, ip: req.ip, userAgent: req.headers['user-agent'], source: 'http' });
  });

  const prefix = (configService.get<string>('API_PREFIX') ?? 'api').replace(/^\/+|\/+$/g, '') || 'api';
  app.setGlobalPrefix(prefix);
  app.enableVersioning({
    type: VersioningType.URI,
    defaultVersion: '1',
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      stopAtFirstError: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );
  app.useGlobalInterceptors(app.get(ResponseInterceptor));
  app.useGlobalFilters(app.get(AllExceptionsFilter));

  app.use(
    helmet({
      crossOriginOpenerPolicy: false,
      crossOriginEmbedderPolicy: false,
      crossOriginResourcePolicy: false,
      hsts: { maxAge: 31536000 },
    }),
  );
  app.use(compression());

  const swaggerEnabled =
    configService.get('NODE_ENV') !== 'production' || configService.get('SWAGGER_ENABLED') === 'true';
  if (swaggerEnabled) {
    const config = new DocumentBuilder()
      .setTitle('Marketplace Order Connector')
      .setDescription('Order ingestion, order commands and picking for marketplace merchants')
      .setVersion('1.0.0')
      .addApiKey({ type: 'apiKey', in: 'header', name: 'x-internal-secret' }, 'internal-secret')
      .addServer(`/${prefix}/v1`, 'v1')
      .build();
    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup(`${prefix}/docs`, app, document, {
      swaggerOptions: { persistAuthorization: true },
    });
  } else {
    logger.log('Swagger is disabled for production. Set SWAGGER_ENABLED=true to re-enable.', 'Bootstrap');
  }

  const port = configService.get<number>('PORT') ?? 4000;
  await app.listen(port);
  logger.log(`Connector listening on ${port}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  console.error('Connector failed to start', err);
  process.exit(1);
});
