/**
 * 브리지 전체에서 사용되는 공통 타입 정의
 * 외부 체인(이더리움)과 동일한 형식을 따름
 */

/**
 * Address: 이더리움 주소 형식
 *
 * - 공개키를 Keccak-256으로 해싱한 후 마지막 20바이트 (40 hex chars)
 * - "0x" 접두사 포함 총 42자
 * - 내부적으로는 항상 소문자로 정규화해서 비교
 */
export type Address = string; // "0x" + 40 hex characters

/**
 * Hash: Keccak-256 해시 (32바이트 = 64 hex chars)
 */
export type Hash = string; // "0x" + 64 hex characters

/**
 * PrivateKey: secp256k1 개인키 (32바이트)
 */
export type PrivateKey = string; // "0x" + 64 hex characters

/**
 * PublicKey: 비압축 공개키 (0x04 접두사 제외, 64바이트)
 */
export type PublicKey = string;

/**
 * HEX 문자열에서 "0x" 접두사 제거
 */
export function stripHexPrefix(hex: string): string {
  return hex.startsWith('0x') ? hex.slice(2) : hex;
}

/**
 * HEX 문자열에 "0x" 접두사 추가
 */
export function addHexPrefix(hex: string): string {
  return hex.startsWith('0x') ? hex : '0x' + hex;
}

/**
 * HEX 문자열 형식 검증
 *
 * @param value - 검증할 문자열
 * @param byteLength - 예상되는 바이트 길이 (선택, 예: 32 = 64 hex chars)
 */
export function isHexString(value: string, byteLength?: number): boolean {
  if (!value || typeof value !== 'string') {
    return false;
  }

  if (!/^0x[0-9a-fA-F]*$/.test(value)) {
    return false;
  }

  const hex = stripHexPrefix(value);

  // 홀수 길이 hex는 무효
  if (hex.length % 2 !== 0) {
    return false;
  }

  if (byteLength !== undefined && hex.length !== byteLength * 2) {
    return false;
  }

  return true;
}

/**
 * 주소 검증 (정확히 20바이트, 0x 접두사 필수)
 */
export function isValidAddress(address: string): boolean {
  return isHexString(address, 20);
}

/**
 * 개인키 검증
 *
 * - 정확히 32바이트
 * - 0이 아니어야 함
 * - secp256k1 order보다 작은지는 라이브러리가 검증
 */
export function isValidPrivateKey(privateKey: string): boolean {
  if (!isHexString(privateKey, 32)) {
    return false;
  }

  const hex = stripHexPrefix(privateKey);
  if (hex === '0'.repeat(64)) {
    return false;
  }

  return true;
}

/**
 * 주소 정규화 (소문자)
 *
 * 이더리움 주소는 case-insensitive (EIP-55 체크섬은 표시용)
 */
export function normalizeAddress(address: Address): Address {
  return address.toLowerCase();
}
