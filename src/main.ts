import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { WsAdapter } from '@nestjs/platform-ws';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { getPort } from './infra/config/env.config';

/**
 * Bootstrap the NestJS application: plain `ws` adapter for node connections,
 * validation, and Swagger documentation.
 */
async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.useWebSocketAdapter(new WsAdapter(app));
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.enableCors();
  app.enableShutdownHooks();

  const config = new DocumentBuilder()
    .setTitle('Teleop Control Plane API')
    .setDescription(
      'Registered nodes, calls forwarded to connected nodes, and device / teleop-group catalogs. Nodes connect over WebSocket at /ws/rpc.',
    )
    .setVersion('1.0')
    .addTag('nodes', 'Node registry, RPC forwarding and notifications')
    .addTag('devices', 'Device and teleop-group type catalogs')
    .addTag('health', 'Health check')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);

  await app.listen(getPort());
}
bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
