import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { BRIDGE_CONFIG, BridgeConfig } from './common/config/bridge.config';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  // DTO 검증 파이프 전역 설정
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // DTO에 없는 속성 제거
      forbidNonWhitelisted: true, // DTO에 없는 속성 있으면 에러
      transform: true,
    }),
  );

  // Swagger 설정
  const swaggerConfig = new DocumentBuilder()
    .setTitle('EVM Tx Bridge API')
    .setDescription('외부 체인 트랜잭션 검증 / 임베디드 배치 인가 API 문서')
    .setVersion('1.0')
    .addTag('account', '계정 관리 API')
    .addTag('transaction', '트랜잭션 검증 API')
    .build();

  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('api', app, document);

  const config = app.get<Readonly<BridgeConfig>>(BRIDGE_CONFIG);
  await app.listen(config.port);

  const logger = new Logger('Bootstrap');
  logger.log(`Application is running on: http://localhost:${config.port}`);
  logger.log(`Swagger UI: http://localhost:${config.port}/api`);
  logger.log(
    `Chain ID: ${config.chainId}, carrier address: ${config.carrierAddress}`,
  );
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start application', error);
  process.exit(1);
});
