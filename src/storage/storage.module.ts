import { Global, Module } from '@nestjs/common';
import { AccountLevelDBRepository } from '../account/repositories/account-leveldb.repository';
import { AccountMemoryRepository } from '../account/repositories/account-memory.repository';
import { IAccountRepository } from '../account/repositories/account.repository.interface';
import { BRIDGE_CONFIG, BridgeConfig } from '../common/config/bridge.config';
import { CryptoService } from '../common/crypto/crypto.service';

/**
 * Storage Module (Global)
 *
 * 인프라 계층 - 계정 저장소 선택
 *
 * - ACCOUNT_DB_PATH 설정 시: LevelDB (classic-level)
 * - 미설정 시: In-Memory
 *
 * Export:
 * - IAccountRepository
 */
@Global()
@Module({
  providers: [
    {
      provide: IAccountRepository,
      useFactory: (
        config: Readonly<BridgeConfig>,
        cryptoService: CryptoService,
      ): IAccountRepository =>
        config.accountDbPath === null
          ? new AccountMemoryRepository()
          : new AccountLevelDBRepository(cryptoService, config),
      inject: [BRIDGE_CONFIG, CryptoService],
    },
  ],
  exports: [IAccountRepository],
})
export class StorageModule {}
