import { Address } from '../../common/types/common.types';

/**
 * Msg: 상태 전이 메시지의 공통 능력 집합
 *
 * 임베디드 배치에 들어가는 모든 메시지 종류가 구현해야 함.
 * 새로운 메시지 종류 = 이 인터페이스를 구현하는 새 타입 (상속 계층 아님)
 *
 * - type(): 메시지 타입 태그 (레지스트리 키)
 * - getSigners(): 서명해야 하는 주소 목록 (순서 의미 있음)
 * - getSignBytes(): 서명 문서에 그대로 들어가는 바이트
 * - validateBasic(): 상태 없이 가능한 자체 검증, 실패 시 BridgeError
 * - encode(): 배치 안에서의 메시지 본문 인코딩
 */
export interface Msg {
  type(): string;
  getSigners(): Address[];
  getSignBytes(): Uint8Array;
  validateBasic(): void;
  encode(): Uint8Array;
}

/**
 * Tx: 검증 파이프라인에 제출되는 트랜잭션
 */
export interface Tx {
  getMsgs(): Msg[];
}
