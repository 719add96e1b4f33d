import { NestedUint8Array, RLP } from '@ethereumjs/rlp';
import { CryptoService } from '../../common/crypto/crypto.service';
import { Signature } from '../../common/crypto/crypto.types';
import {
  ADDRESS_LENGTH,
  TYPE_TX_ETHEREUM,
} from '../../common/constants/bridge.constants';
import {
  DecodeFailureError,
  InvalidValueError,
  SignatureInvalidError,
} from '../../common/errors/bridge.errors';
import {
  Address,
  Hash,
  isValidAddress,
  normalizeAddress,
  PrivateKey,
} from '../../common/types/common.types';
import { OnceCell } from '../../common/utils/once-cell';
import type { EmbeddedBatch } from '../../embedded/entities/embedded-batch.entity';
import type { MessageRegistry } from '../../embedded/messages/message.registry';
import {
  decodeUint,
  encodeUint,
  expectBytes,
  expectList,
  MAX_UINT64,
} from '../codec/rlp.codec';
import { Msg, Tx } from './tx.types';

/**
 * TxData: 외부 체인 트랜잭션 필드 (와이어 순서 그대로)
 *
 * RLP([nonce, gasPrice, gasLimit, to, value, data, v, r, s])
 */
export interface TxData {
  nonce: bigint; // u64
  gasPrice: bigint;
  gasLimit: bigint; // u64
  recipient: Address | null; // null = 컨트랙트 생성
  amount: bigint;
  payload: Uint8Array;
  v: bigint;
  r: bigint;
  s: bigint;
}

export interface CreateWireTransactionParams {
  nonce: bigint | number;
  recipient: Address | null;
  amount: bigint;
  gasLimit: bigint | number;
  gasPrice: bigint;
  payload?: Uint8Array;
}

interface SenderCacheEntry {
  chainId: bigint;
  address: Address;
}

/**
 * WireTransaction
 *
 * 외부 체인(이더리움 레거시) 트랜잭션과 비트 단위로 호환되는 레코드.
 *
 * 생명주기:
 * 1. create() - 서명 전 (v = r = s = 0)
 * 2. sign() - v, r, s를 제자리에서 채움 (EIP-155)
 * 3. 제출 → 검증 (읽기 전용)
 * 4. 블록 커밋 후 폐기
 *
 * hash / size / sender는 파생값. OnceCell에 캐시하고 서명이 바뀌면 무효화.
 *
 * payload의 수신자가 예약 주소(carrier)이면 payload는 EmbeddedBatch 인코딩.
 */
export class WireTransaction implements Tx, Msg {
  private static readonly crypto = new CryptoService();

  private readonly data: TxData;

  private readonly hashCache = new OnceCell<Hash>();
  private readonly sizeCache = new OnceCell<number>();
  private readonly senderCache = new OnceCell<SenderCacheEntry>();

  private constructor(data: TxData) {
    this.data = data;
  }

  /**
   * 서명 전 트랜잭션 생성
   */
  static create(params: CreateWireTransactionParams): WireTransaction {
    const nonce = BigInt(params.nonce);
    const gasLimit = BigInt(params.gasLimit);

    if (nonce < 0n || nonce > MAX_UINT64) {
      throw new InvalidValueError(`nonce out of uint64 range: ${nonce}`);
    }
    if (gasLimit < 0n || gasLimit > MAX_UINT64) {
      throw new InvalidValueError(`gas limit out of uint64 range: ${gasLimit}`);
    }
    if (params.recipient !== null && !isValidAddress(params.recipient)) {
      throw new InvalidValueError(`invalid recipient address: ${params.recipient}`);
    }

    return new WireTransaction({
      nonce,
      gasPrice: params.gasPrice,
      gasLimit,
      recipient:
        params.recipient === null ? null : normalizeAddress(params.recipient),
      amount: params.amount,
      payload: Uint8Array.from(params.payload ?? new Uint8Array(0)),
      v: 0n,
      r: 0n,
      s: 0n,
    });
  }

  /**
   * 와이어 바이트 → 트랜잭션
   *
   * 외부 체인 디코더와 같은 규칙:
   * - 정확히 9개 필드의 리스트
   * - 정수는 앞자리 0 없는 정규 인코딩, nonce/gasLimit은 8바이트 이하
   * - to는 빈 바이트(컨트랙트 생성) 또는 20바이트
   *
   * @throws {DecodeFailureError}
   */
  static decode(bytes: Uint8Array): WireTransaction {
    let decoded: Uint8Array | NestedUint8Array;
    try {
      decoded = RLP.decode(bytes);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DecodeFailureError(`invalid transaction encoding: ${reason}`);
    }

    const fields = expectList(decoded, 'transaction');
    if (fields.length !== 9) {
      throw new DecodeFailureError(
        `invalid transaction encoding: expected 9 fields, got ${fields.length}`,
      );
    }

    const to = expectBytes(fields[3], 'to');
    if (to.length !== 0 && to.length !== ADDRESS_LENGTH) {
      throw new DecodeFailureError(
        `invalid recipient length: got ${to.length}, want ${ADDRESS_LENGTH}`,
      );
    }

    const tx = new WireTransaction({
      nonce: decodeUint(expectBytes(fields[0], 'nonce'), 'nonce', 8),
      gasPrice: decodeUint(expectBytes(fields[1], 'gasPrice'), 'gasPrice'),
      gasLimit: decodeUint(expectBytes(fields[2], 'gasLimit'), 'gasLimit', 8),
      recipient:
        to.length === 0 ? null : WireTransaction.crypto.bytesToHex(to),
      amount: decodeUint(expectBytes(fields[4], 'value'), 'value'),
      payload: Uint8Array.from(expectBytes(fields[5], 'data')),
      v: decodeUint(expectBytes(fields[6], 'v'), 'v'),
      r: decodeUint(expectBytes(fields[7], 'r'), 'r'),
      s: decodeUint(expectBytes(fields[8], 's'), 's'),
    });
    tx.sizeCache.set(bytes.length);
    return tx;
  }

  get nonce(): bigint {
    return this.data.nonce;
  }

  get gasPrice(): bigint {
    return this.data.gasPrice;
  }

  get gasLimit(): bigint {
    return this.data.gasLimit;
  }

  get recipient(): Address | null {
    return this.data.recipient;
  }

  get amount(): bigint {
    return this.data.amount;
  }

  get payload(): Uint8Array {
    return Uint8Array.from(this.data.payload);
  }

  get signature(): Signature {
    return { v: this.data.v, r: this.data.r, s: this.data.s };
  }

  /**
   * 서명 대상 해시
   *
   * - chainId ≠ 0: keccak256(RLP([nonce, gasPrice, gasLimit, to, value, data, chainId, 0, 0]))
   * - chainId = 0: keccak256(RLP([nonce, gasPrice, gasLimit, to, value, data])) (레거시)
   */
  signingHash(chainId: bigint): Uint8Array {
    const fields: Uint8Array[] = this.unsignedFields();
    if (chainId !== 0n) {
      fields.push(encodeUint(chainId), new Uint8Array(0), new Uint8Array(0));
    }
    return WireTransaction.crypto.keccak256(RLP.encode(fields));
  }

  /**
   * EIP-155 서명 (제자리 변경)
   *
   * 다시 서명하면 이전 서명을 덮어씀. hash/size/sender 캐시는 무효화.
   */
  sign(chainId: bigint, privateKey: PrivateKey): void {
    const signature = WireTransaction.crypto.signTransaction(
      this.signingHash(chainId),
      privateKey,
      chainId,
    );

    this.data.v = signature.v;
    this.data.r = signature.r;
    this.data.s = signature.s;

    this.hashCache.reset();
    this.sizeCache.reset();
    this.senderCache.reset();
  }

  /**
   * 서명으로부터 발신자 주소 복구
   *
   * 1. (v, r, s) + chainId → 65바이트 컴팩트 서명 (v 인코딩 역변환)
   * 2. 같은 chainId의 서명 해시로 공개키 복구 (low-s 필수)
   *
   * 다른 체인 ID로 서명된 트랜잭션은 recoveryId가 0/1이 아니게 되어 실패.
   *
   * @throws {SignatureInvalidError}
   */
  deriveSender(chainId: bigint): Address {
    if (chainId < 0n) {
      throw new SignatureInvalidError(
        `invalid signature: negative chain id ${chainId}`,
      );
    }

    const cached = this.senderCache.peek();
    if (cached !== undefined && cached.chainId === chainId) {
      return cached.address;
    }

    const compact = WireTransaction.crypto.toCompactSignature(
      this.signature,
      chainId,
    );
    const address = WireTransaction.crypto.recoverAddress(
      this.signingHash(chainId),
      compact,
      true,
    );

    this.senderCache.set({ chainId, address });
    return address;
  }

  /**
   * 예약 주소로 보내진 트랜잭션인지 (payload = EmbeddedBatch)
   */
  isEmbeddedCarrier(carrierAddress: Address): boolean {
    return (
      this.data.recipient !== null &&
      this.data.recipient === normalizeAddress(carrierAddress)
    );
  }

  /**
   * payload → EmbeddedBatch
   *
   * @throws {DecodeFailureError}
   */
  decodeEmbeddedBatch(registry: MessageRegistry): EmbeddedBatch {
    return registry.decodeBatch(this.data.payload);
  }

  /**
   * 와이어 인코딩
   *
   * RLP([nonce, gasPrice, gasLimit, to, value, data, v, r, s])
   */
  encode(): Uint8Array {
    return RLP.encode([
      ...this.unsignedFields(),
      encodeUint(this.data.v),
      encodeUint(this.data.r),
      encodeUint(this.data.s),
    ]);
  }

  /**
   * 트랜잭션 해시 = keccak256(encode())
   */
  hash(): Hash {
    return this.hashCache.get(() =>
      WireTransaction.crypto.hashBuffer(this.encode()),
    );
  }

  /**
   * 인코딩된 바이트 길이
   */
  size(): number {
    return this.sizeCache.get(() => this.encode().length);
  }

  /**
   * 기본 검증 (상태 없이)
   *
   * gasPrice와 amount 모두 0보다 커야 함 (0도 거부)
   *
   * @throws {InvalidValueError}
   */
  validateBasic(): void {
    if (this.data.gasPrice <= 0n) {
      throw new InvalidValueError('price must be positive');
    }
    if (this.data.amount <= 0n) {
      throw new InvalidValueError('amount must be positive');
    }
  }

  type(): string {
    return TYPE_TX_ETHEREUM;
  }

  /**
   * 서명자 = 복구된 발신자 (deriveSender 호출 이후에만 알 수 있음)
   */
  getSigners(): Address[] {
    const cached = this.senderCache.peek();
    return cached === undefined ? [] : [cached.address];
  }

  /**
   * 서명 바이트는 체인 ID가 필요하므로 메시지 단위로는 제공하지 않음 (signingHash 사용)
   */
  getSignBytes(): Uint8Array {
    return new Uint8Array(0);
  }

  getMsgs(): Msg[] {
    return [this];
  }

  /**
   * 로그용 요약
   */
  describe(): string {
    return `${this.hash()} (to: ${this.data.recipient ?? 'contract creation'}, value: ${this.data.amount})`;
  }

  /**
   * JSON 직렬화 (Ethereum JSON-RPC 표준)
   */
  toJSON() {
    return {
      hash: this.hash(),
      nonce: `0x${this.data.nonce.toString(16)}`,
      gasPrice: `0x${this.data.gasPrice.toString(16)}`,
      gas: `0x${this.data.gasLimit.toString(16)}`,
      to: this.data.recipient,
      value: `0x${this.data.amount.toString(16)}`,
      input: WireTransaction.crypto.bytesToHex(this.data.payload),
      v: `0x${this.data.v.toString(16)}`,
      r: `0x${this.data.r.toString(16)}`,
      s: `0x${this.data.s.toString(16)}`,
    };
  }

  private unsignedFields(): Uint8Array[] {
    return [
      encodeUint(this.data.nonce),
      encodeUint(this.data.gasPrice),
      encodeUint(this.data.gasLimit),
      this.data.recipient === null
        ? new Uint8Array(0)
        : WireTransaction.crypto.hexToBytes(this.data.recipient),
      encodeUint(this.data.amount),
      this.data.payload,
    ];
  }
}

/**
 * 타입 가드 (파이프라인 1단계)
 */
export function isWireTransaction(tx: unknown): tx is WireTransaction {
  return tx instanceof WireTransaction;
}
