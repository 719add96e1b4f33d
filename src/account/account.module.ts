import { Module } from '@nestjs/common';
import { AccountController } from './account.controller';
import { IAccountStore } from './account-store.interface';
import { AccountService } from './account.service';

/**
 * Account Module
 *
 * 구조:
 * - Controller (HTTP API)
 * - Service (IAccountStore 구현, StateManager 저널 위에서 동작)
 *
 * Export:
 * - AccountService: HTTP 계층, 트랜잭션 서비스에서 사용
 * - IAccountStore: 검증 파이프라인이 의존하는 계약 (AccountService를 그대로 제공)
 *
 * StateModule, StorageModule이 Global이므로 StateManager는 자동 주입
 */
@Module({
  controllers: [AccountController],
  providers: [
    AccountService,
    {
      provide: IAccountStore,
      useExisting: AccountService,
    },
  ],
  exports: [AccountService, IAccountStore],
})
export class AccountModule {}
