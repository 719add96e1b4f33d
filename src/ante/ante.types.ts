import { BridgeError, ErrorCode } from '../common/errors/bridge.errors';
import { TxContext } from '../context/tx-context';

export type ResultCode = 'OK' | ErrorCode;

/**
 * 검증 결과
 *
 * - gasWanted: 트랜잭션의 gasLimit (미터 설치 전 거부면 0)
 * - gasUsed: 거부/완료 시점까지 미터가 누적한 값
 */
export interface Result {
  ok: boolean;
  code: ResultCode;
  log: string;
  gasWanted: bigint;
  gasUsed: bigint;
}

/**
 * 파이프라인 출력: (컨텍스트, 결과, 중단 여부)
 *
 * abort = true 이면 result.ok = false 이고 code가 실패 종류를 나타냄
 */
export interface AnteOutcome {
  ctx: TxContext;
  result: Result;
  abort: boolean;
}

export function acceptOutcome(ctx: TxContext, log = ''): AnteOutcome {
  return {
    ctx,
    result: {
      ok: true,
      code: 'OK',
      log,
      gasWanted: ctx.gasMeter.limit(),
      gasUsed: ctx.gasMeter.gasConsumed(),
    },
    abort: false,
  };
}

export function rejectOutcome(ctx: TxContext, error: BridgeError): AnteOutcome {
  return {
    ctx,
    result: {
      ok: false,
      code: error.code,
      log: error.message,
      gasWanted: ctx.gasMeter.limit(),
      gasUsed: ctx.gasMeter.gasConsumed(),
    },
    abort: true,
  };
}
