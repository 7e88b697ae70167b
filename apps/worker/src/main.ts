import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { MicroserviceOptions, Transport } from '@nestjs/microservices';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { GENERATION_PROTO_PATH, GENFORGE_PACKAGE_NAME } from '@genforge/proto';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  // Hybrid application: HTTP for health checks + gRPC for the job API
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);

  const grpcHost = configService.get<string>('WORKER_GRPC_HOST', '0.0.0.0');
  const grpcPort = configService.get<number>('WORKER_GRPC_PORT', 50051);

  // ── gRPC Microservice ───────────────────────────────────
  app.connectMicroservice<MicroserviceOptions>({
    transport: Transport.GRPC,
    options: {
      package: GENFORGE_PACKAGE_NAME,
      protoPath: GENERATION_PROTO_PATH,
      url: `${grpcHost}:${grpcPort}`,
      loader: {
        keepCase: false,
        longs: Number,
        defaults: false,
        oneofs: true,
      },
    },
  });

  // Start all microservices, then the HTTP server for health checks
  await app.startAllMicroservices();

  const httpPort = configService.get<number>('WORKER_HTTP_PORT', 50052);
  await app.listen(httpPort);

  logger.log(`Worker gRPC server listening on ${grpcHost}:${grpcPort}`);
  logger.log(`Worker health check on http://localhost:${httpPort}/health`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(
    `Worker failed to start: ${error instanceof Error ? error.stack : String(error)}`,
  );
  process.exit(1);
});
