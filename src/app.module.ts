import { Module } from '@nestjs/common';
import { AccountModule } from './account/account.module';
import { AnteModule } from './ante/ante.module';
import { CommonModule } from './common/common.module';
import { EmbeddedModule } from './embedded/embedded.module';
import { StateModule } from './state/state.module';
import { StorageModule } from './storage/storage.module';
import { TransactionModule } from './transaction/transaction.module';

/**
 * AppModule
 *
 * 애플리케이션의 루트 모듈
 *
 * Global Modules:
 * - CommonModule: CryptoService, BRIDGE_CONFIG
 * - StateModule: StateManager (저널링)
 * - StorageModule: IAccountRepository (In-Memory 또는 LevelDB)
 *
 * Feature Modules:
 * - AccountModule: 계정 저장소 계약(IAccountStore) + 계정 API
 * - EmbeddedModule: 메시지 레지스트리, 임베디드 배치 검증
 * - AnteModule: 검증 파이프라인
 * - TransactionModule: 원시 트랜잭션 제출 / 커밋 경계
 */
@Module({
  imports: [
    // Global Modules
    CommonModule,
    StateModule,
    StorageModule,

    // Feature Modules
    AccountModule,
    EmbeddedModule,
    AnteModule,
    TransactionModule,
  ],
})
export class AppModule {}
