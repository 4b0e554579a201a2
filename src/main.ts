import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { loadAppRole } from '@common/config/app-role';

async function bootstrap() {
  const role = loadAppRole();
  const app = configureApp(await NestFactory.create(AppModule.forRole(role)));

  // SIGTERM 시 Consumer 정지 → 브로커 연결 종료
  app.enableShutdownHooks();

  // Swagger Setup
  if (process.env.NODE_ENV !== 'production') {
    const swagger = await import('@nestjs/swagger');
    const DocumentBuilder = swagger.DocumentBuilder;
    const SwaggerModule = swagger.SwaggerModule;

    const swaggerConfig = new DocumentBuilder()
      .setTitle('Basket Checkout / Ordering API')
      .setDescription('장바구니 체크아웃과 주문 생성 API')
      .setVersion('1.0')
      .build();
    const document = SwaggerModule.createDocument(app, swaggerConfig);
    SwaggerModule.setup('docs', app, document);
  }

  // Start Application
  await app.listen(process.env.PORT ?? 3000);
  Logger.log(`애플리케이션 시작 - role: ${role}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error('애플리케이션 시작 실패', error instanceof Error ? error.stack : String(error), 'Bootstrap');
  process.exit(1);
});
