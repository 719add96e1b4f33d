/**
 * 가스 미터
 *
 * 트랜잭션 하나를 검증하는 동안 소비한 자원을 누적하고 gasLimit을 넘으면 중단.
 *
 * 동작 규칙:
 * - consumeGas는 먼저 누적한 뒤 한도를 검사
 * - 한도를 넘으면 OutOfGasError를 던짐 (누적값은 초과분 포함 상태로 유지)
 * - OutOfGasError는 검증 파이프라인 경계에서만 잡아서 OutOfResource 결과로 변환
 */
export interface GasMeter {
  limit(): bigint;
  gasConsumed(): bigint;
  consumeGas(amount: bigint, descriptor: string): void;
}

/**
 * 가스 소진 신호
 *
 * 일반 실패 반환이 아니라 호출 스택을 한 번에 빠져나가는 용도.
 */
export class OutOfGasError extends Error {
  constructor(readonly descriptor: string) {
    super(`out of gas in location: ${descriptor}`);
    this.name = 'OutOfGasError';
  }
}

export class BasicGasMeter implements GasMeter {
  private consumed = 0n;

  constructor(private readonly gasLimit: bigint) {
    if (gasLimit < 0n) {
      throw new Error(`gas limit must not be negative: ${gasLimit}`);
    }
  }

  limit(): bigint {
    return this.gasLimit;
  }

  gasConsumed(): bigint {
    return this.consumed;
  }

  consumeGas(amount: bigint, descriptor: string): void {
    if (amount < 0n) {
      throw new Error(`negative gas consumption in ${descriptor}: ${amount}`);
    }
    this.consumed += amount;
    if (this.consumed > this.gasLimit) {
      throw new OutOfGasError(descriptor);
    }
  }
}

/**
 * 한도 없는 미터 (파이프라인 진입 전 기본 컨텍스트용)
 */
export class InfiniteGasMeter implements GasMeter {
  private consumed = 0n;

  limit(): bigint {
    return 0n;
  }

  gasConsumed(): bigint {
    return this.consumed;
  }

  consumeGas(amount: bigint, descriptor: string): void {
    if (amount < 0n) {
      throw new Error(`negative gas consumption in ${descriptor}: ${amount}`);
    }
    this.consumed += amount;
  }
}
