/**
 * 브리지 에러 분류
 *
 * 검증 파이프라인의 모든 실패는 아래 코드 중 하나로 귀결됨.
 * BridgeError가 아닌 예외는 프로그래밍 오류로 간주하고 그대로 전파.
 */
export enum ErrorCode {
  /** 외부 체인 트랜잭션이 아닌 Tx가 제출됨 */
  TypeMismatch = 'TYPE_MISMATCH',
  /** 컨텍스트의 체인 ID를 10진 정수로 해석할 수 없음 */
  InvalidChainId = 'INVALID_CHAIN_ID',
  /** 외부 서명 복구 실패 */
  SignatureInvalid = 'SIGNATURE_INVALID',
  /** payload 디코딩 실패 또는 잘못된 중첩 */
  DecodeFailure = 'DECODE_FAILURE',
  /** 서명 개수 불일치 또는 서명자 불일치 */
  Unauthorized = 'UNAUTHORIZED',
  /** 가스 소진 */
  OutOfResource = 'OUT_OF_RESOURCE',
  /** 상태에 없는 계정 */
  UnknownAddress = 'UNKNOWN_ADDRESS',
  /** 이미 존재하는 계정 생성 시도 */
  AccountExists = 'ACCOUNT_EXISTS',
  /** 필드 값 규칙 위반 (금액, 가격 등) */
  InvalidValue = 'INVALID_VALUE',
}

export class BridgeError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class TypeMismatchError extends BridgeError {
  constructor(message = 'tx must be an Ethereum transaction') {
    super(ErrorCode.TypeMismatch, message);
  }
}

export class InvalidChainIdError extends BridgeError {
  constructor(chainId: string) {
    super(ErrorCode.InvalidChainId, `invalid chainID: ${JSON.stringify(chainId)}`);
  }
}

export class SignatureInvalidError extends BridgeError {
  constructor(message = 'signature verification failed') {
    super(ErrorCode.SignatureInvalid, message);
  }
}

export class DecodeFailureError extends BridgeError {
  constructor(message: string) {
    super(ErrorCode.DecodeFailure, message);
  }
}

export class UnauthorizedError extends BridgeError {
  constructor(message: string) {
    super(ErrorCode.Unauthorized, message);
  }
}

export class OutOfResourceError extends BridgeError {
  constructor(message: string) {
    super(ErrorCode.OutOfResource, message);
  }
}

export class UnknownAddressError extends BridgeError {
  constructor(address: string) {
    super(
      ErrorCode.UnknownAddress,
      `account for address ${address} not in state`,
    );
  }
}

export class AccountExistsError extends BridgeError {
  constructor(address: string) {
    super(
      ErrorCode.AccountExists,
      `account for address ${address} already exists`,
    );
  }
}

export class InvalidValueError extends BridgeError {
  constructor(message: string) {
    super(ErrorCode.InvalidValue, message);
  }
}

/**
 * 저장소의 계정 레코드를 읽을 수 없음
 *
 * 검증 실패가 아니라 저장소 손상이므로 BridgeError가 아님 (파이프라인 밖으로 전파)
 */
export class AccountRecordError extends Error {
  constructor(
    readonly address: string,
    reason: string,
  ) {
    super(`corrupted account record for ${address}: ${reason}`);
    this.name = 'AccountRecordError';
  }
}
