/**
 * 브리지 전역 상수 정의
 */

/**
 * DEFAULT_CHAIN_ID: 기본 체인 식별자
 *
 * 실행 컨텍스트는 체인 ID를 문자열로 전달함 (예: "2").
 * 파이프라인이 10진 정수로 해석해서 EIP-155 서명 검증에 사용.
 */
export const DEFAULT_CHAIN_ID = '2';

/**
 * DEFAULT_CARRIER_ADDRESS: 임베디드 배치 운반용 예약 주소
 *
 * 이 주소로 보내진 트랜잭션의 payload는 EmbeddedBatch로 해석됨.
 * 실제 배포에서는 CARRIER_ADDRESS 환경 변수로 지정.
 */
export const DEFAULT_CARRIER_ADDRESS =
  '0x0000000000000000000000000000000000000100';

/**
 * TYPE_TX_ETHEREUM: 외부 체인 트랜잭션의 메시지 타입 태그
 *
 * 임베디드 배치 안에 이 타입의 메시지가 있으면 재귀 임베딩으로 거부.
 */
export const TYPE_TX_ETHEREUM = 'Ethereum';

/**
 * 가스 스케줄 기본값
 *
 * - TX_SIZE_COST_PER_BYTE: 인코딩된 트랜잭션 바이트당 비용
 * - SIG_VERIFY_COST_SECP256K1: 서명 복구 1회 비용
 * - READ_COST_FLAT / WRITE_COST_FLAT: 계정 저장소 읽기/쓰기 1회 비용
 */
export const DEFAULT_GAS_CONFIG = {
  txSizeCostPerByte: 1n,
  sigVerifyCost: 100n,
  readCostFlat: 10n,
  writeCostFlat: 10n,
} as const;

/**
 * secp256k1 곡선 차수 (n)
 *
 * - r, s는 [1, n-1] 범위여야 함
 * - s는 n/2 이하여야 함 (Homestead 규칙, malleability 방지)
 */
export const SECP256K1_N = BigInt(
  '0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141',
);
export const SECP256K1_HALF_N = SECP256K1_N / 2n;

/**
 * 바이트 길이 상수
 */
export const ADDRESS_LENGTH = 20;
export const HASH_LENGTH = 32;
export const COMPACT_SIGNATURE_LENGTH = 65; // r(32) + s(32) + recoveryId(1)

/**
 * EIP-155 v 인코딩 오프셋
 *
 * - 레거시 (chainId = 0): v = recoveryId + 27
 * - EIP-155: v = recoveryId + 35 + chainId * 2
 */
export const LEGACY_V_OFFSET = 27n;
export const EIP155_V_OFFSET = 35n;
