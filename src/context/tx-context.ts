import { GasMeter, InfiniteGasMeter } from '../gas/gas-meter';

/**
 * TxContext: 트랜잭션 1건의 실행 컨텍스트
 *
 * 외부 엔진(합의 계층)이 트랜잭션마다 만들어 넘겨주는 값:
 * - chainId: 체인 식별자 문자열 (예: "2")
 * - gasMeter: 자원 미터
 *
 * 불변 객체. 미터를 바꾸려면 withGasMeter로 새 컨텍스트를 만듦.
 */
export class TxContext {
  constructor(
    readonly chainId: string,
    readonly gasMeter: GasMeter = new InfiniteGasMeter(),
  ) {}

  withGasMeter(gasMeter: GasMeter): TxContext {
    return new TxContext(this.chainId, gasMeter);
  }
}
