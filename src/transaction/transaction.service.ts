import { Inject, Injectable, Logger } from '@nestjs/common';
import { AnteHandler } from '../ante/ante.handler';
import { AnteOutcome, rejectOutcome } from '../ante/ante.types';
import { BRIDGE_CONFIG, BridgeConfig } from '../common/config/bridge.config';
import { CryptoService } from '../common/crypto/crypto.service';
import {
  BridgeError,
  DecodeFailureError,
  InvalidValueError,
} from '../common/errors/bridge.errors';
import {
  Address,
  Hash,
  isHexString,
  isValidPrivateKey,
  PrivateKey,
} from '../common/types/common.types';
import { TxContext } from '../context/tx-context';
import { StateManager } from '../state/state-manager';
import { WireTransaction } from './entities/wire-transaction.entity';

const DEFAULT_GAS_PRICE = BigInt('1000000000'); // 1 Gwei
const DEFAULT_GAS_LIMIT = BigInt(100000);

export interface SubmitResult {
  hash: Hash | null;
  outcome: AnteOutcome;
}

export interface SignedTransaction {
  tx: WireTransaction;
  raw: string;
  from: Address;
}

export interface SignTransactionOptions {
  nonce?: number;
  data?: string;
  gasPrice?: bigint;
  gasLimit?: bigint;
  chainId?: string;
}

/**
 * Transaction Service
 *
 * 검증 파이프라인의 호출자이자 커밋 경계.
 *
 * submitRaw 흐름:
 * 1. 와이어 바이트 디코딩 (실패 시 DecodeFailure 결과)
 * 2. validateBasic (gasPrice > 0, amount > 0)
 * 3. StateManager checkpoint
 * 4. AnteHandler 실행
 * 5. 통과 → checkpoint 커밋 + 저장소 반영 / 거부 → checkpoint 되돌림
 *
 * BridgeError가 아닌 예외는 checkpoint를 되돌리고 그대로 다시 던짐.
 */
@Injectable()
export class TransactionService {
  private readonly logger = new Logger(TransactionService.name);

  constructor(
    private readonly cryptoService: CryptoService,
    private readonly anteHandler: AnteHandler,
    private readonly stateManager: StateManager,
    @Inject(BRIDGE_CONFIG) private readonly config: Readonly<BridgeConfig>,
  ) {}

  /**
   * 서명된 원시 트랜잭션 검증 + 커밋
   *
   * @param rawHex - RLP 인코딩된 트랜잭션 (0x 접두사 선택)
   * @param chainId - 컨텍스트 체인 ID (기본: 설정값)
   */
  async submitRaw(
    rawHex: string,
    chainId: string = this.config.chainId,
  ): Promise<SubmitResult> {
    const ctx = new TxContext(chainId);

    let tx: WireTransaction;
    try {
      tx = this.decodeRaw(rawHex);
      tx.validateBasic();
    } catch (error: unknown) {
      if (error instanceof BridgeError) {
        this.logger.debug(`Transaction rejected before ante: ${error.message}`);
        return { hash: null, outcome: rejectOutcome(ctx, error) };
      }
      throw error;
    }

    const outcome = await this.stateManager.exclusive(() =>
      this.runInCheckpoint(ctx, tx),
    );

    if (!outcome.abort) {
      this.logger.log(`Transaction accepted: ${tx.describe()}`);
    }
    return { hash: tx.hash(), outcome };
  }

  /**
   * 원시 HEX → WireTransaction
   *
   * @throws {DecodeFailureError}
   */
  decodeRaw(rawHex: string): WireTransaction {
    const prefixed = rawHex.startsWith('0x') ? rawHex : `0x${rawHex}`;
    if (!isHexString(prefixed)) {
      throw new DecodeFailureError('raw transaction must be a hex string');
    }
    return WireTransaction.decode(this.cryptoService.hexToBytes(prefixed));
  }

  /**
   * 트랜잭션 생성 + 서명 (개발/테스트용)
   *
   * ⚠️ 개인키를 서버로 보내는 것은 테스트 목적으로만 허용
   *
   * @throws {InvalidValueError} 개인키가 secp256k1 범위 밖일 때
   */
  signTransaction(
    privateKey: PrivateKey,
    to: Address | null,
    value: bigint,
    options: SignTransactionOptions = {},
  ): SignedTransaction {
    if (!isValidPrivateKey(privateKey)) {
      throw new InvalidValueError('invalid private key');
    }

    const tx = WireTransaction.create({
      nonce: options.nonce ?? 0,
      recipient: to,
      amount: value,
      gasLimit: options.gasLimit ?? DEFAULT_GAS_LIMIT,
      gasPrice: options.gasPrice ?? DEFAULT_GAS_PRICE,
      payload:
        options.data === undefined
          ? undefined
          : this.cryptoService.hexToBytes(options.data),
    });

    const chainId = BigInt(options.chainId ?? this.config.chainId);
    tx.sign(chainId, privateKey);

    return {
      tx,
      raw: this.cryptoService.bytesToHex(tx.encode()),
      from: tx.deriveSender(chainId),
    };
  }

  private async runInCheckpoint(
    ctx: TxContext,
    tx: WireTransaction,
  ): Promise<AnteOutcome> {
    this.stateManager.checkpoint();

    let outcome: AnteOutcome;
    try {
      outcome = await this.anteHandler.handle(ctx, tx);
    } catch (error: unknown) {
      this.stateManager.revertCheckpoint();
      throw error;
    }

    if (outcome.abort) {
      const { size } = this.stateManager.getJournalStats();
      this.stateManager.revertCheckpoint();
      this.logger.debug(
        `Checkpoint reverted: ${size} pending account write(s) discarded`,
      );
      return outcome;
    }

    this.stateManager.commitCheckpoint();
    try {
      await this.stateManager.commit();
    } catch (error: unknown) {
      this.stateManager.rollback();
      throw error;
    }
    return outcome;
  }
}
