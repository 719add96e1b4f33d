import { Module } from '@nestjs/common';
import { EmbeddedModule } from '../embedded/embedded.module';
import { AnteHandler } from './ante.handler';

/**
 * Ante Module
 *
 * 검증 파이프라인(AnteHandler) 제공
 *
 * 의존성:
 * - EmbeddedModule: MessageRegistry, EmbeddedValidator
 * - BRIDGE_CONFIG: CommonModule(Global)에서 제공 (예약 주소, 가스 스케줄)
 */
@Module({
  imports: [EmbeddedModule],
  providers: [AnteHandler],
  exports: [AnteHandler],
})
export class AnteModule {}
