import { Injectable, Logger } from '@nestjs/common';
import { LRUCache } from 'lru-cache';
import { Account } from '../account/entities/account.entity';
import { IAccountRepository } from '../account/repositories/account.repository.interface';
import { Address, normalizeAddress } from '../common/types/common.types';

/**
 * StateManager
 *
 * 역할:
 * - 트랜잭션 검증 중 임시 상태 관리 (저널링)
 * - commit() 시 IAccountRepository에 저장
 * - 캐시 관리
 *
 * 커밋 경계는 호출자(TransactionService)가 관리:
 *   checkpoint() → 검증 → commitCheckpoint() + commit()  또는  revertCheckpoint()
 *
 * 저널에 들어간 Account는 바꾸지 않음. 변경은 항상 clone() 후 setAccount().
 * 그래서 revertCheckpoint()는 최상단 레벨을 버리는 것만으로 충분함.
 */
@Injectable()
export class StateManager {
  private readonly logger = new Logger(StateManager.name);

  // 캐시: 저장소에서 읽은 커밋된 계정들
  private readonly cache = new LRUCache<Address, Account>({ max: 1000 });

  // 저널링 스택: 중첩된 checkpoint 지원
  // 예: [기본 레벨, 트랜잭션 checkpoint, ...]
  private journalStack: Map<Address, Account>[] = [];

  // exclusive()로 들어온 작업을 한 번에 하나씩 실행
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly accountRepository: IAccountRepository) {}

  /**
   * 계정 조회: 저널 스택 (최상단부터) → 캐시 → 저장소
   * 없으면 null (새로 만들지 않음)
   */
  async getAccount(address: Address): Promise<Account | null> {
    const key = normalizeAddress(address);

    for (let i = this.journalStack.length - 1; i >= 0; i--) {
      const account = this.journalStack[i].get(key);
      if (account) {
        return account;
      }
    }

    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    try {
      const account = await this.accountRepository.findByAddress(key);
      if (account) {
        this.cache.set(key, account);
      }
      return account;
    } catch (error: unknown) {
      this.logger.error(`Failed to load account ${key}`, error);
      throw error;
    }
  }

  /**
   * 계정 저장: 저널 스택 최상단에 기록 (commit 시 저장소에 반영)
   */
  setAccount(account: Account): void {
    if (this.journalStack.length === 0) {
      this.journalStack.push(new Map());
    }
    this.journalStack[this.journalStack.length - 1].set(
      account.address,
      account,
    );
  }

  /**
   * 다음 계정 번호 발급 (저장소 카운터)
   */
  allocateAccountNumber(): Promise<number> {
    return this.accountRepository.allocateAccountNumber();
  }

  /**
   * Checkpoint 생성: 스택에 새 레벨 추가
   */
  checkpoint(): void {
    this.journalStack.push(new Map<Address, Account>());
  }

  /**
   * Checkpoint 커밋: 최상단 레벨을 하위 레벨에 병합
   *
   * 최하위 레벨이면 그대로 둠 (commit()에서 저장)
   */
  commitCheckpoint(): void {
    const top = this.journalStack.pop();
    if (!top) {
      throw new Error('Cannot commit: journal stack is empty');
    }
    if (this.journalStack.length === 0) {
      this.journalStack.push(top);
      return;
    }

    const lower = this.journalStack[this.journalStack.length - 1];
    for (const [address, account] of top.entries()) {
      lower.set(address, account);
    }
  }

  /**
   * Checkpoint 롤백: 최상단 레벨 제거 (하위 레벨은 그대로)
   */
  revertCheckpoint(): void {
    if (this.journalStack.length === 0) {
      throw new Error('Cannot revert: journal stack is empty');
    }
    this.journalStack.pop();
  }

  /**
   * 저널 스택 전체를 병합해서 저장소에 기록 후 스택 비움
   */
  async commit(): Promise<number> {
    const merged = new Map<Address, Account>();
    for (const journal of this.journalStack) {
      for (const [address, account] of journal.entries()) {
        merged.set(address, account);
      }
    }

    for (const [address, account] of merged.entries()) {
      await this.accountRepository.save(account);
      this.cache.set(address, account);
    }

    this.journalStack = [];
    if (merged.size > 0) {
      this.logger.debug(`Committed ${merged.size} account(s)`);
    }
    return merged.size;
  }

  /**
   * 저널 스택 전체 폐기
   */
  rollback(): void {
    this.journalStack = [];
  }

  /**
   * 작업을 직렬로 실행
   *
   * 검증은 한 번에 트랜잭션 하나씩만 진행되어야 하므로
   * checkpoint ~ commit 구간을 감싸는 데 사용.
   * 앞 작업이 실패해도 다음 작업은 실행됨.
   */
  exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  getJournalStats(): { size: number; depth: number } {
    let size = 0;
    for (const journal of this.journalStack) {
      size += journal.size;
    }
    return { size, depth: this.journalStack.length };
  }
}
