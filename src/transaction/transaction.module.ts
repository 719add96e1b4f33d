import { Module } from '@nestjs/common';
import { AnteModule } from '../ante/ante.module';
import { TransactionController } from './transaction.controller';
import { TransactionService } from './transaction.service';

/**
 * Transaction Module
 *
 * 트랜잭션 제출 흐름:
 * 1. 디코딩 + 기본 검증
 * 2. checkpoint 안에서 검증 파이프라인 실행
 * 3. 결과에 따라 커밋 또는 되돌림
 *
 * 구성:
 * - TransactionController: API 엔드포인트
 * - TransactionService: 호출자 / 커밋 경계
 *
 * 의존성:
 * - AnteModule: AnteHandler
 * - StateModule (Global): StateManager
 */
@Module({
  imports: [AnteModule],
  controllers: [TransactionController],
  providers: [TransactionService],
  exports: [TransactionService],
})
export class TransactionModule {}
