import { Injectable, Logger } from '@nestjs/common';
import {
  AccountExistsError,
  UnknownAddressError,
} from '../common/errors/bridge.errors';
import { Address, normalizeAddress } from '../common/types/common.types';
import { StateManager } from '../state/state-manager';
import { IAccountStore } from './account-store.interface';
import { Account } from './entities/account.entity';

/**
 * Account Service
 *
 * IAccountStore 구현. 모든 읽기/쓰기는 StateManager 저널을 거침.
 *
 * - 읽기: 저널 → 캐시 → 저장소
 * - 쓰기: 복사본을 만들어 바꾼 뒤 저널 최상단에 기록 (copy-on-write)
 *   → 호출자가 checkpoint를 되돌리면 흔적이 남지 않음
 *
 * HTTP로 들어오는 계정 생성(openAccount)은 자체적으로 커밋까지 함.
 */
@Injectable()
export class AccountService extends IAccountStore {
  private readonly logger = new Logger(AccountService.name);

  constructor(private readonly stateManager: StateManager) {
    super();
  }

  async getAccount(address: Address): Promise<Account> {
    const account = await this.stateManager.getAccount(address);
    if (!account) {
      throw new UnknownAddressError(normalizeAddress(address));
    }
    return account;
  }

  /**
   * 커밋된 계정 조회 (없으면 null)
   *
   * 검증 중인 트랜잭션의 checkpoint가 끝난 뒤에 읽음.
   * exclusive 작업 안에서 호출하면 교착되므로 파이프라인에서는 getAccount 사용.
   */
  async findAccount(address: Address): Promise<Account | null> {
    return this.stateManager.exclusive(() =>
      this.stateManager.getAccount(address),
    );
  }

  async getSequence(address: Address): Promise<number> {
    return (await this.getAccount(address)).sequence;
  }

  async getAccountNumber(address: Address): Promise<number> {
    return (await this.getAccount(address)).accountNumber;
  }

  async incrementSequence(address: Address): Promise<number> {
    const updated = (await this.getAccount(address)).clone();
    updated.incrementSequence();
    this.stateManager.setAccount(updated);
    return updated.sequence;
  }

  async setAccount(account: Account): Promise<void> {
    this.stateManager.setAccount(account.clone());
    return Promise.resolve();
  }

  async createAccount(address: Address): Promise<Account> {
    const normalized = normalizeAddress(address);
    if (await this.stateManager.getAccount(normalized)) {
      throw new AccountExistsError(normalized);
    }

    const accountNumber = await this.stateManager.allocateAccountNumber();
    const account = new Account(normalized, accountNumber);
    this.stateManager.setAccount(account);
    return account;
  }

  /**
   * 계정 생성 + 즉시 커밋
   *
   * 검증 중인 트랜잭션과 섞이지 않도록 StateManager.exclusive 안에서 실행
   *
   * @throws {AccountExistsError}
   */
  async openAccount(address: Address): Promise<Account> {
    return this.stateManager.exclusive(async () => {
      this.stateManager.checkpoint();
      let account: Account;
      try {
        account = await this.createAccount(address);
      } catch (error: unknown) {
        this.stateManager.revertCheckpoint();
        throw error;
      }

      this.stateManager.commitCheckpoint();
      try {
        await this.stateManager.commit();
      } catch (error: unknown) {
        this.stateManager.rollback();
        throw error;
      }

      this.logger.log(
        `Account opened: ${account.address} (#${account.accountNumber})`,
      );
      return account;
    });
  }
}
