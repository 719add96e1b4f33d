import { Injectable } from '@nestjs/common';
import { Address, normalizeAddress } from '../../common/types/common.types';
import { Account } from '../entities/account.entity';
import { IAccountRepository } from './account.repository.interface';

/**
 * In-Memory Account Repository
 *
 * - Map<Address, Account>로 메모리에 저장
 * - ACCOUNT_DB_PATH가 없을 때의 기본 저장소, 테스트에서도 사용
 * - 서버 재시작 시 데이터 소실
 *
 * 저장/조회 모두 복사본을 주고받음 (호출자가 바꿔도 저장된 값은 그대로)
 */
@Injectable()
export class AccountMemoryRepository extends IAccountRepository {
  private readonly accounts = new Map<Address, Account>();
  private nextAccountNumber = 0;

  async findByAddress(address: Address): Promise<Account | null> {
    const account = this.accounts.get(normalizeAddress(address));
    return Promise.resolve(account ? account.clone() : null);
  }

  async save(account: Account): Promise<void> {
    this.accounts.set(account.address, account.clone());
    return Promise.resolve();
  }

  async allocateAccountNumber(): Promise<number> {
    return Promise.resolve(this.nextAccountNumber++);
  }
}
