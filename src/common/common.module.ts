import { Global, Module } from '@nestjs/common';
import { BRIDGE_CONFIG, loadBridgeConfig } from './config/bridge.config';
import { CryptoService } from './crypto/crypto.service';

/**
 * CommonModule
 *
 * 전역 모듈로 선언하여 모든 모듈에서 자동으로 사용 가능
 *
 * 포함된 프로바이더:
 * - CryptoService: 해싱, 키 생성, 서명/복구, RLP
 * - BRIDGE_CONFIG: 환경 변수에서 한 번 읽은 동결된 설정
 */
@Global()
@Module({
  providers: [
    CryptoService,
    {
      provide: BRIDGE_CONFIG,
      useFactory: () => loadBridgeConfig(),
    },
  ],
  exports: [CryptoService, BRIDGE_CONFIG],
})
export class CommonModule {}
