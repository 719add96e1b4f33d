import { Injectable } from '@nestjs/common';
import { Input, NestedUint8Array, RLP } from '@ethereumjs/rlp';
import {
  bigIntToBytes,
  bytesToBigInt,
  bytesToHex,
  hexToBytes,
  setLengthLeft,
} from '@ethereumjs/util';
import { ec as EC } from 'elliptic';
import createKeccakHash from 'keccak';
import {
  COMPACT_SIGNATURE_LENGTH,
  EIP155_V_OFFSET,
  HASH_LENGTH,
  LEGACY_V_OFFSET,
  SECP256K1_HALF_N,
  SECP256K1_N,
} from '../constants/bridge.constants';
import { SignatureInvalidError } from '../errors/bridge.errors';
import {
  addHexPrefix,
  Address,
  Hash,
  isValidPrivateKey,
  PrivateKey,
  PublicKey,
  stripHexPrefix,
} from '../types/common.types';
import { KeyPair, RecoverableSignature, Signature } from './crypto.types';

/**
 * CryptoService
 *
 * 브리지의 모든 암호화 기능을 담당하는 서비스 (SignatureCodec 역할)
 * 외부 체인(이더리움)과 동일한 알고리즘 사용:
 * - secp256k1 타원곡선 (ECDSA)
 * - Keccak-256 해싱
 * - EIP-155 v 인코딩
 *
 * 두 가지 서명 형식을 다룸:
 * 1. 와이어 트랜잭션 서명 (v, r, s) - 체인 ID가 v에 인코딩됨
 * 2. 컴팩트 서명 65 bytes (r ‖ s ‖ recoveryId) - 임베디드 배치 서명자용
 */
@Injectable()
export class CryptoService {
  private readonly ec: EC;

  constructor() {
    this.ec = new EC('secp256k1');
  }

  /**
   * Keccak-256 해시 (바이트 반환)
   */
  keccak256(bytes: Uint8Array): Uint8Array {
    const digest = createKeccakHash('keccak256')
      .update(Buffer.from(bytes))
      .digest();
    return new Uint8Array(digest);
  }

  /**
   * Keccak-256 해시 (HEX 문자열 반환)
   *
   * @returns "0x" + 64 hex characters
   */
  hashBuffer(buffer: Uint8Array): Hash {
    return this.bytesToHex(this.keccak256(buffer));
  }

  /**
   * 무작위 개인키 생성
   *
   * ec.genKeyPair()가 1 ≤ key < n 범위를 보장
   */
  generatePrivateKey(): PrivateKey {
    const keyPair = this.ec.genKeyPair();
    const privateKey = keyPair.getPrivate('hex');
    return addHexPrefix(privateKey.padStart(64, '0'));
  }

  /**
   * 개인키로부터 공개키 생성
   *
   * @returns 비압축 공개키 128 hex characters (0x04 접두사 제외)
   */
  getPublicKeyFromPrivate(privateKey: PrivateKey): PublicKey {
    if (!isValidPrivateKey(privateKey)) {
      throw new Error('Invalid private key');
    }

    const keyPair = this.ec.keyFromPrivate(stripHexPrefix(privateKey), 'hex');
    return keyPair.getPublic().encode('hex', false).slice(2);
  }

  /**
   * 공개키로부터 주소 생성
   *
   * 1. 공개키(64바이트) → Keccak-256
   * 2. 마지막 20바이트
   */
  publicKeyToAddress(publicKey: PublicKey): Address {
    const hash = this.keccak256(Buffer.from(stripHexPrefix(publicKey), 'hex'));
    return this.bytesToHex(hash.slice(-20)).toLowerCase();
  }

  privateKeyToAddress(privateKey: PrivateKey): Address {
    return this.publicKeyToAddress(this.getPublicKeyFromPrivate(privateKey));
  }

  generateKeyPair(): KeyPair {
    const privateKey = this.generatePrivateKey();
    const publicKey = this.getPublicKeyFromPrivate(privateKey);
    const address = this.publicKeyToAddress(publicKey);

    return { privateKey, publicKey, address };
  }

  /**
   * 32바이트 해시에 대한 원시 ECDSA 서명
   *
   * canonical: true → s가 항상 n/2 이하 (low-s)
   */
  signHash(hash: Uint8Array, privateKey: PrivateKey): RecoverableSignature {
    if (hash.length !== HASH_LENGTH) {
      throw new Error('Invalid message hash (must be 32 bytes)');
    }
    if (!isValidPrivateKey(privateKey)) {
      throw new Error('Invalid private key');
    }

    const keyPair = this.ec.keyFromPrivate(stripHexPrefix(privateKey), 'hex');
    const signature = keyPair.sign(Buffer.from(hash), { canonical: true });

    return {
      r: BigInt(addHexPrefix(signature.r.toString(16))),
      s: BigInt(addHexPrefix(signature.s.toString(16))),
      recoveryId: signature.recoveryParam ?? 0,
    };
  }

  /**
   * 트랜잭션 서명 (EIP-155)
   *
   * - chainId = 0: v = recoveryId + 27 (레거시, 리플레이 보호 없음)
   * - chainId ≠ 0: v = recoveryId + 35 + chainId * 2
   */
  signTransaction(
    signingHash: Uint8Array,
    privateKey: PrivateKey,
    chainId: bigint,
  ): Signature {
    const { r, s, recoveryId } = this.signHash(signingHash, privateKey);
    return { v: this.encodeV(recoveryId, chainId), r, s };
  }

  encodeV(recoveryId: number, chainId: bigint): bigint {
    if (chainId === 0n) {
      return BigInt(recoveryId) + LEGACY_V_OFFSET;
    }
    return BigInt(recoveryId) + EIP155_V_OFFSET + chainId * 2n;
  }

  /**
   * (v, r, s) + chainId → 65바이트 컴팩트 서명
   *
   * v 인코딩을 역으로 풀어 recoveryId를 마지막 바이트에 기록.
   * 여기서는 바이트 하나에 들어가는지만 확인하고, 0/1 검사는 복구 단계에서 함.
   *
   * @throws {SignatureInvalidError} r/s가 32바이트를 넘거나 recoveryId가 바이트 범위를 벗어날 때
   */
  toCompactSignature(signature: Signature, chainId: bigint): Uint8Array {
    const recoveryId =
      chainId === 0n
        ? signature.v - LEGACY_V_OFFSET
        : signature.v - chainId * 2n - EIP155_V_OFFSET;

    if (recoveryId < 0n || recoveryId > 255n) {
      throw new SignatureInvalidError(
        `invalid signature: v=${signature.v} does not match chain id ${chainId}`,
      );
    }
    if (signature.r < 0n || signature.s < 0n) {
      throw new SignatureInvalidError('invalid signature: negative r or s');
    }

    const r = this.toWord(signature.r);
    const s = this.toWord(signature.s);

    const compact = new Uint8Array(COMPACT_SIGNATURE_LENGTH);
    compact.set(r, 0);
    compact.set(s, 32);
    compact[64] = Number(recoveryId);
    return compact;
  }

  /**
   * 해시에 대한 65바이트 컴팩트 서명 생성 (r ‖ s ‖ recoveryId)
   */
  signCompact(hash: Uint8Array, privateKey: PrivateKey): Uint8Array {
    const { r, s, recoveryId } = this.signHash(hash, privateKey);
    const compact = new Uint8Array(COMPACT_SIGNATURE_LENGTH);
    compact.set(this.toWord(r), 0);
    compact.set(this.toWord(s), 32);
    compact[64] = recoveryId;
    return compact;
  }

  /**
   * 컴팩트 서명으로부터 공개키 복구
   *
   * 검증 규칙:
   * - 길이 65
   * - recoveryId ∈ {0, 1}
   * - 1 ≤ r, s < n
   * - requireLowS면 s ≤ n/2 (와이어 트랜잭션 발신자 복구 시)
   *
   * @throws {SignatureInvalidError} 규칙 위반 또는 복구 실패
   */
  recoverPublicKey(
    hash: Uint8Array,
    compact: Uint8Array,
    requireLowS = false,
  ): PublicKey {
    if (hash.length !== HASH_LENGTH) {
      throw new SignatureInvalidError('invalid message hash length');
    }
    if (compact.length !== COMPACT_SIGNATURE_LENGTH) {
      throw new SignatureInvalidError(
        `invalid signature length: got ${compact.length}, want ${COMPACT_SIGNATURE_LENGTH}`,
      );
    }

    const r = bytesToBigInt(compact.subarray(0, 32));
    const s = bytesToBigInt(compact.subarray(32, 64));
    const recoveryId = compact[64];

    if (recoveryId !== 0 && recoveryId !== 1) {
      throw new SignatureInvalidError(`invalid recovery id: ${recoveryId}`);
    }
    if (r < 1n || r >= SECP256K1_N || s < 1n || s >= SECP256K1_N) {
      throw new SignatureInvalidError('invalid signature values');
    }
    if (requireLowS && s > SECP256K1_HALF_N) {
      throw new SignatureInvalidError('invalid signature: s is not in lower half');
    }

    let encoded: string;
    try {
      const point = this.ec.recoverPubKey(
        Buffer.from(hash),
        { r: r.toString(16), s: s.toString(16) },
        recoveryId,
      );
      if (point.isInfinity()) {
        throw new Error('recovered point at infinity');
      }
      encoded = point.encode('hex', false);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SignatureInvalidError(`public key recovery failed: ${reason}`);
    }

    return encoded.slice(2);
  }

  /**
   * 컴팩트 서명으로부터 주소 복구
   */
  recoverAddress(
    hash: Uint8Array,
    compact: Uint8Array,
    requireLowS = false,
  ): Address {
    return this.publicKeyToAddress(
      this.recoverPublicKey(hash, compact, requireLowS),
    );
  }

  // ========================================
  // RLP (Recursive Length Prefix) 인코딩
  // ========================================

  rlpEncode(input: Input): Uint8Array {
    return RLP.encode(input);
  }

  /**
   * RLP 디코딩
   *
   * 입력 전체가 하나의 아이템이어야 함 (나머지 바이트가 있으면 에러)
   */
  rlpDecode(encoded: Uint8Array): Uint8Array | NestedUint8Array {
    return RLP.decode(encoded);
  }

  hexToBytes(hex: string): Uint8Array {
    return hexToBytes(`0x${hex.startsWith('0x') ? hex.slice(2) : hex}`);
  }

  bytesToHex(bytes: Uint8Array): string {
    return addHexPrefix(bytesToHex(bytes));
  }

  /**
   * bigint → 32바이트 big-endian
   */
  private toWord(value: bigint): Uint8Array {
    const bytes = value === 0n ? new Uint8Array(0) : bigIntToBytes(value);
    if (bytes.length > 32) {
      throw new SignatureInvalidError('invalid signature: value exceeds 32 bytes');
    }
    return setLengthLeft(bytes, 32);
  }
}
