import { Inject, Injectable, Logger } from '@nestjs/common';
import { IAccountStore } from '../account/account-store.interface';
import {
  acceptOutcome,
  AnteOutcome,
  rejectOutcome,
} from '../ante/ante.types';
import {
  BRIDGE_CONFIG,
  BridgeConfig,
  GasConfig,
} from '../common/config/bridge.config';
import { TYPE_TX_ETHEREUM } from '../common/constants/bridge.constants';
import { CryptoService } from '../common/crypto/crypto.service';
import {
  BridgeError,
  DecodeFailureError,
  SignatureInvalidError,
  UnauthorizedError,
} from '../common/errors/bridge.errors';
import { Address } from '../common/types/common.types';
import { TxContext } from '../context/tx-context';
import { EmbeddedBatch } from './entities/embedded-batch.entity';

/**
 * EmbeddedValidator
 *
 * 외부 체인 트랜잭션 안에 실려 온 EmbeddedBatch를 독립적으로 재검증/재인가.
 *
 * 1. 구조 검사: 서명 개수 == 필요한 서명자 수
 * 2. 메시지 검사: 중첩된 외부 체인 트랜잭션 거부, 메시지별 validateBasic (첫 실패에서 중단)
 * 3. 서명자 순서대로:
 *    a. 계정 조회 (없으면 저장소 에러 그대로)
 *    b. 서명 문서 생성 (chainId, msgs, accountNumber, sequence)
 *    c. 같은 위치의 서명으로 주소 복구 → 기대 서명자와 비교
 *    d. 성공하면 그 서명자의 sequence + 1 (다음 서명자로 넘어가기 전에)
 *
 * 중간 서명자에서 실패하면 앞서 증가한 sequence는 그대로 남음.
 * 되돌릴지는 호출자의 checkpoint가 결정.
 *
 * OutOfGasError는 잡지 않음 (AnteHandler 경계에서 처리)
 */
@Injectable()
export class EmbeddedValidator {
  private readonly logger = new Logger(EmbeddedValidator.name);
  private readonly gas: Readonly<GasConfig>;

  constructor(
    private readonly accountStore: IAccountStore,
    private readonly cryptoService: CryptoService,
    @Inject(BRIDGE_CONFIG) config: Readonly<BridgeConfig>,
  ) {
    this.gas = config.gas;
  }

  async validate(ctx: TxContext, batch: EmbeddedBatch): Promise<AnteOutcome> {
    try {
      const signers = this.validateBasic(batch);
      await this.authorize(ctx, batch, signers);

      return acceptOutcome(
        ctx,
        `embedded batch authorized: ${batch.messages.length} message(s), ${signers.length} signer(s)`,
      );
    } catch (error: unknown) {
      if (error instanceof BridgeError) {
        this.logger.debug(`Embedded batch rejected: ${error.message}`);
        return rejectOutcome(ctx, error);
      }
      throw error;
    }
  }

  /**
   * 상태 없이 가능한 검사
   *
   * @returns 필요한 서명자 목록 (서명과 위치로 매칭됨)
   * @throws {UnauthorizedError} 서명 개수 불일치
   * @throws {DecodeFailureError} 외부 체인 트랜잭션이 중첩됨
   */
  validateBasic(batch: EmbeddedBatch): Address[] {
    const signers = batch.getRequiredSigners();
    if (batch.signatures.length !== signers.length) {
      throw new UnauthorizedError(
        `wrong number of signatures: expected ${signers.length}, got ${batch.signatures.length}`,
      );
    }

    for (const msg of batch.getMsgs()) {
      if (msg.type() === TYPE_TX_ETHEREUM) {
        throw new DecodeFailureError(
          'invalid nesting: embedded batch must not carry an Ethereum transaction',
        );
      }
      msg.validateBasic();
    }

    return signers;
  }

  private async authorize(
    ctx: TxContext,
    batch: EmbeddedBatch,
    signers: Address[],
  ): Promise<void> {
    for (const [index, signer] of signers.entries()) {
      ctx.gasMeter.consumeGas(this.gas.readCostFlat, 'ReadFlat');
      const account = await this.accountStore.getAccount(signer);

      const signBytes = batch.signBytes(
        ctx.chainId,
        account.accountNumber,
        account.sequence,
      );

      ctx.gasMeter.consumeGas(this.gas.sigVerifyCost, 'ante verify: secp256k1');
      const recovered = this.recoverSigner(signBytes, batch.signatures[index]);
      if (recovered !== signer) {
        throw new UnauthorizedError(
          `signature verification failed: expected signer ${signer}, recovered ${recovered}`,
        );
      }

      ctx.gasMeter.consumeGas(this.gas.writeCostFlat, 'WriteFlat');
      await this.accountStore.incrementSequence(signer);
    }
  }

  private recoverSigner(signBytes: Uint8Array, signature: Uint8Array): Address {
    try {
      return this.cryptoService.recoverAddress(
        this.cryptoService.keccak256(signBytes),
        signature,
      );
    } catch (error: unknown) {
      if (error instanceof SignatureInvalidError) {
        throw new UnauthorizedError(
          `signature verification failed: ${error.message}`,
        );
      }
      throw error;
    }
  }
}
