import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  BRIDGE_CONFIG,
  BridgeConfig,
  GasConfig,
} from '../common/config/bridge.config';
import {
  BridgeError,
  InvalidChainIdError,
  OutOfResourceError,
  TypeMismatchError,
} from '../common/errors/bridge.errors';
import { Address } from '../common/types/common.types';
import { TxContext } from '../context/tx-context';
import { EmbeddedValidator } from '../embedded/embedded.validator';
import { MessageRegistry } from '../embedded/messages/message.registry';
import { BasicGasMeter, OutOfGasError } from '../gas/gas-meter';
import { Tx } from '../transaction/entities/tx.types';
import {
  isWireTransaction,
  WireTransaction,
} from '../transaction/entities/wire-transaction.entity';
import { acceptOutcome, AnteOutcome, rejectOutcome } from './ante.types';

const DECIMAL_DIGITS = /^\d+$/;

/**
 * 체인 ID 문자열 → 정수 (부호 없는 10진수만)
 *
 * @throws {InvalidChainIdError}
 */
export function parseChainId(chainId: string): bigint {
  if (!DECIMAL_DIGITS.test(chainId)) {
    throw new InvalidChainIdError(chainId);
  }
  return BigInt(chainId);
}

/**
 * AnteHandler (검증 파이프라인)
 *
 * 상태 전이:
 *   Start → GasMetered → ChainIdResolved → SignerRecovered
 *         → { PlainAccepted | EmbeddedDelegated } → Terminal
 *
 * 1. WireTransaction이 아니면 즉시 거부 (TypeMismatch)
 * 2. gasLimit 한도의 미터 설치. 이후 모든 작업은 이 미터 아래에서 실행
 * 3. 가스 소진(OutOfGasError)은 이 경계에서만 잡아 OutOfResource 결과로 변환.
 *    BridgeError가 아닌 다른 예외는 그대로 전파
 * 4. 컨텍스트 체인 ID를 10진 정수로 해석 (InvalidChainId)
 * 5. 서명으로 발신자 복구 (SignatureInvalid). 복구된 주소는 저장하지 않음
 * 6. 수신자가 예약 주소면 payload를 EmbeddedBatch로 디코딩해서 EmbeddedValidator에 위임
 * 7. 아니면 일반 송금으로 통과 (상태 변경 없음)
 *
 * 어떤 단계도 재시도하지 않음. 실패는 곧바로 abort = true 결과.
 */
@Injectable()
export class AnteHandler {
  private readonly logger = new Logger(AnteHandler.name);
  private readonly carrierAddress: Address;
  private readonly gas: Readonly<GasConfig>;

  constructor(
    private readonly messageRegistry: MessageRegistry,
    private readonly embeddedValidator: EmbeddedValidator,
    @Inject(BRIDGE_CONFIG) config: Readonly<BridgeConfig>,
  ) {
    this.carrierAddress = config.carrierAddress;
    this.gas = config.gas;
  }

  async handle(ctx: TxContext, tx: Tx): Promise<AnteOutcome> {
    if (!isWireTransaction(tx)) {
      const error = new TypeMismatchError();
      this.logger.debug(`Transaction rejected: ${error.message}`);
      return rejectOutcome(ctx, error);
    }

    const meteredCtx = ctx.withGasMeter(new BasicGasMeter(tx.gasLimit));

    try {
      return await this.run(meteredCtx, tx);
    } catch (error: unknown) {
      if (!(error instanceof OutOfGasError)) {
        throw error;
      }

      const meter = meteredCtx.gasMeter;
      this.logger.warn(
        `Out of gas in ${error.descriptor}: gasWanted=${meter.limit()}, gasUsed=${meter.gasConsumed()}`,
      );
      return rejectOutcome(
        meteredCtx,
        new OutOfResourceError(
          `${error.message}; gasWanted: ${meter.limit()}, gasUsed: ${meter.gasConsumed()}`,
        ),
      );
    }
  }

  private async run(ctx: TxContext, tx: WireTransaction): Promise<AnteOutcome> {
    try {
      ctx.gasMeter.consumeGas(
        BigInt(tx.size()) * this.gas.txSizeCostPerByte,
        'txSize',
      );

      const chainId = parseChainId(ctx.chainId);

      ctx.gasMeter.consumeGas(this.gas.sigVerifyCost, 'ante verify: secp256k1');
      const sender = tx.deriveSender(chainId);

      if (!tx.isEmbeddedCarrier(this.carrierAddress)) {
        return acceptOutcome(ctx, `transfer from ${sender} accepted`);
      }

      const batch = tx.decodeEmbeddedBatch(this.messageRegistry);
      return await this.embeddedValidator.validate(ctx, batch);
    } catch (error: unknown) {
      if (error instanceof BridgeError) {
        this.logger.debug(`Transaction rejected: ${error.message}`);
        return rejectOutcome(ctx, error);
      }
      throw error;
    }
  }
}
