import { Address } from '../../common/types/common.types';
import { Account } from '../entities/account.entity';

/**
 * Account Repository Interface
 *
 * 계정의 영구 저장소. StateManager가 커밋할 때만 쓰기가 일어남.
 * 구현: In-Memory (기본, 테스트) / LevelDB (ACCOUNT_DB_PATH 설정 시)
 *
 * NestJS DI 토큰으로 쓰기 위해 abstract class로 선언
 */
export abstract class IAccountRepository {
  /**
   * @returns Account 또는 null (없으면)
   */
  abstract findByAddress(address: Address): Promise<Account | null>;

  /**
   * 생성 or 업데이트
   */
  abstract save(account: Account): Promise<void>;

  /**
   * 다음 계정 번호 발급
   *
   * 단조 증가. 발급 후 계정 생성이 롤백되면 그 번호는 비어 있는 채로 남음.
   */
  abstract allocateAccountNumber(): Promise<number>;
}
