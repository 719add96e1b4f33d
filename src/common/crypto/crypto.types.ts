/**
 * 암호화 관련 타입 정의
 */

/**
 * Signature: 트랜잭션 서명 (v, r, s)
 *
 * 외부 체인 와이어 포맷과 동일하게 세 값 모두 정수:
 * - r, s: ECDSA 서명 (각 최대 32 bytes)
 * - v: 복구 식별자
 *   - 레거시: 27 or 28
 *   - EIP-155: chainId * 2 + 35 + recoveryId
 *
 * 서명 전 트랜잭션은 v = r = s = 0
 */
export interface Signature {
  v: bigint;
  r: bigint;
  s: bigint;
}

/**
 * RecoverableSignature: 체인 ID 인코딩 전의 원시 ECDSA 서명
 */
export interface RecoverableSignature {
  r: bigint;
  s: bigint;
  recoveryId: number;
}

/**
 * KeyPair: 공개키-개인키 쌍
 */
export interface KeyPair {
  privateKey: string;
  publicKey: string;
  address: string;
}
