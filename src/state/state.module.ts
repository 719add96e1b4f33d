import { Global, Module } from '@nestjs/common';
import { StateManager } from './state-manager';

/**
 * StateModule
 *
 * 전역 모듈로 선언하여 모든 모듈에서 StateManager 사용 가능
 *
 * 포함된 서비스:
 * - StateManager: 저널링(checkpoint/commit/revert), 캐시
 *
 * 의존성:
 * - IAccountRepository: StorageModule에서 글로벌로 제공
 */
@Global()
@Module({
  providers: [StateManager],
  exports: [StateManager],
})
export class StateModule {}
