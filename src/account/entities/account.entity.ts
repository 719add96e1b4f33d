import { Address, normalizeAddress } from '../../common/types/common.types';

export interface AccountJson {
  address: Address;
  accountNumber: number;
  sequence: number;
}

/**
 * Account Entity
 *
 * 임베디드 배치 인가에 필요한 계정 상태:
 * - address: 계정 식별자 (소문자 정규화)
 * - accountNumber: 생성 시 한 번 부여되는 고유 번호 (서명 문서에 포함)
 * - sequence: 임베디드 배치 서명마다 1씩 증가하는 카운터
 *
 * sequence는 와이어 트랜잭션의 nonce와 별개.
 * nonce는 외부 체인 쪽 재전송 방지이고 여기서는 검사하지 않음.
 *
 * 저널에 들어간 객체를 직접 바꾸지 않도록 변경은 clone() 후에 함.
 */
export class Account {
  readonly address: Address;
  readonly accountNumber: number;
  sequence: number;

  constructor(address: Address, accountNumber: number, sequence = 0) {
    if (!Number.isSafeInteger(accountNumber) || accountNumber < 0) {
      throw new Error(`Invalid account number: ${accountNumber}`);
    }
    if (!Number.isSafeInteger(sequence) || sequence < 0) {
      throw new Error(`Invalid sequence: ${sequence}`);
    }
    this.address = normalizeAddress(address);
    this.accountNumber = accountNumber;
    this.sequence = sequence;
  }

  /**
   * Sequence 증가
   *
   * 서명 하나가 검증된 뒤에만 호출됨 (검증 전 증가 금지)
   */
  incrementSequence(): void {
    this.sequence++;
  }

  clone(): Account {
    return new Account(this.address, this.accountNumber, this.sequence);
  }

  toJSON(): AccountJson {
    return {
      address: this.address,
      accountNumber: this.accountNumber,
      sequence: this.sequence,
    };
  }
}
