import { NestedUint8Array } from '@ethereumjs/rlp';
import { bigIntToUnpaddedBytes, bytesToBigInt } from '@ethereumjs/util';
import { DecodeFailureError } from '../../common/errors/bridge.errors';

/**
 * RLP 정수 규칙 (외부 체인 인코더와 동일)
 *
 * - 0은 빈 바이트열
 * - 그 외에는 앞자리 0 없는 big-endian
 * - 디코딩 시 앞자리 0이 있으면 비정규 인코딩으로 거부
 */
export const MAX_UINT64 = 2n ** 64n - 1n;

export function encodeUint(value: bigint): Uint8Array {
  if (value < 0n) {
    throw new RangeError(`cannot RLP-encode negative integer: ${value}`);
  }
  return bigIntToUnpaddedBytes(value);
}

export function decodeUint(
  bytes: Uint8Array,
  field: string,
  maxBytes?: number,
): bigint {
  if (bytes.length > 0 && bytes[0] === 0) {
    throw new DecodeFailureError(
      `rlp: non-canonical integer (leading zero bytes) for ${field}`,
    );
  }
  if (maxBytes !== undefined && bytes.length > maxBytes) {
    throw new DecodeFailureError(`rlp: input string too long for ${field}`);
  }
  return bytes.length === 0 ? 0n : bytesToBigInt(bytes);
}

/**
 * 디코딩된 값이 바이트열인지 확인
 */
export function expectBytes(
  value: Uint8Array | NestedUint8Array | undefined,
  field: string,
): Uint8Array {
  if (!(value instanceof Uint8Array)) {
    throw new DecodeFailureError(`rlp: expected input string for ${field}`);
  }
  return value;
}

/**
 * 디코딩된 값이 리스트인지 확인
 */
export function expectList(
  value: Uint8Array | NestedUint8Array | undefined,
  field: string,
): NestedUint8Array {
  if (!Array.isArray(value)) {
    throw new DecodeFailureError(`rlp: expected input list for ${field}`);
  }
  return value;
}
