import canonicalize from 'canonicalize';
import { validateSync, ValidationError } from 'class-validator';
import {
  DecodeFailureError,
  InvalidValueError,
} from '../../common/errors/bridge.errors';

/**
 * 메시지 본문 공통 코덱
 *
 * bank 계열 메시지의 본문은 정규 JSON(UTF-8).
 * - 디코딩: 형식만 확인 (필드 타입). 값 규칙은 validateBasic에서 class-validator로 검사
 * - 인코딩: RFC 8785 정규 JSON(canonicalize) → UTF-8
 *
 * 금액/시퀀스 같은 정수는 10진 문자열로 넣어야 함
 */
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });
const utf8Encoder = new TextEncoder();

export const ADDRESS_PATTERN = /^0x[a-fA-F0-9]{40}$/;
export const POSITIVE_INTEGER_PATTERN = /^[1-9]\d*$/;

export function utf8ToBytes(text: string): Uint8Array {
  return utf8Encoder.encode(text);
}

export function bytesToUtf8(bytes: Uint8Array, field: string): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch {
    throw new DecodeFailureError(`${field}: invalid UTF-8`);
  }
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue | undefined };

export function encodeJsonBody(value: JsonValue): Uint8Array {
  const text = canonicalize(value);
  if (text === undefined) {
    throw new TypeError('message body is not serializable to JSON');
  }
  return utf8ToBytes(text);
}

/**
 * 본문 → JSON 객체
 *
 * @throws {DecodeFailureError} UTF-8/JSON이 아니거나 객체가 아닐 때
 */
export function decodeJsonBody(
  body: Uint8Array,
  type: string,
): Record<string, unknown> {
  const text = bytesToUtf8(body, type);

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DecodeFailureError(`${type}: invalid JSON body: ${reason}`);
  }

  if (!isRecord(parsed)) {
    throw new DecodeFailureError(`${type}: body must be a JSON object`);
  }
  return parsed;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function requireString(
  source: Record<string, unknown>,
  key: string,
  type: string,
): string {
  const value = source[key];
  if (typeof value !== 'string') {
    throw new DecodeFailureError(`${type}: field "${key}" must be a string`);
  }
  return value;
}

/**
 * class-validator 검증 → InvalidValueError
 *
 * 메시지 이름을 앞에 붙이고 위반 항목을 '; '로 연결
 */
export function assertValid(target: object, type: string): void {
  const errors = validateSync(target);
  if (errors.length === 0) {
    return;
  }
  throw new InvalidValueError(`${type}: ${flattenErrors(errors).join('; ')}`);
}

function flattenErrors(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...flattenErrors(error.children ?? []),
  ]);
}
