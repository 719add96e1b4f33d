import { Address } from '../common/types/common.types';
import { Account } from './entities/account.entity';

/**
 * AccountStore
 *
 * 검증 파이프라인이 계정 상태에 접근하는 유일한 통로.
 * 호출 하나하나는 원자적이라고 가정하고 별도 잠금은 하지 않음.
 *
 * 커밋/롤백 경계는 이 인터페이스 밖(호출자)에서 관리.
 * 여기서의 쓰기는 현재 checkpoint에만 기록됨.
 */
export abstract class IAccountStore {
  /**
   * @throws {UnknownAddressError} 계정이 없을 때
   */
  abstract getAccount(address: Address): Promise<Account>;

  /**
   * 없는 계정을 0으로 취급하지 않음
   *
   * @throws {UnknownAddressError}
   */
  abstract getSequence(address: Address): Promise<number>;

  /**
   * @throws {UnknownAddressError}
   */
  abstract getAccountNumber(address: Address): Promise<number>;

  /**
   * sequence += 1
   *
   * @returns 증가 후 sequence
   * @throws {UnknownAddressError}
   */
  abstract incrementSequence(address: Address): Promise<number>;

  abstract setAccount(account: Account): Promise<void>;

  /**
   * sequence 0, 새 계정 번호로 생성
   *
   * @throws {AccountExistsError} 이미 있으면
   */
  abstract createAccount(address: Address): Promise<Account>;
}
