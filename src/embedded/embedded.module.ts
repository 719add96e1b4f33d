import { Module } from '@nestjs/common';
import { AccountModule } from '../account/account.module';
import { EmbeddedValidator } from './embedded.validator';
import { MessageRegistry } from './messages/message.registry';

/**
 * Embedded Module
 *
 * 구조:
 * - MessageRegistry: 메시지 타입 → 디코더, payload → EmbeddedBatch
 * - EmbeddedValidator: 배치 재검증 + 서명자별 인가
 *
 * 의존성:
 * - IAccountStore: AccountModule에서 제공
 */
@Module({
  imports: [AccountModule],
  providers: [MessageRegistry, EmbeddedValidator],
  exports: [MessageRegistry, EmbeddedValidator],
})
export class EmbeddedModule {}
