import { Test, TestingModule } from '@nestjs/testing';
import { AccountService } from '../../src/account/account.service';
import { Account } from '../../src/account/entities/account.entity';
import { AccountMemoryRepository } from '../../src/account/repositories/account-memory.repository';
import { IAccountRepository } from '../../src/account/repositories/account.repository.interface';
import {
  AccountExistsError,
  ErrorCode,
  UnknownAddressError,
} from '../../src/common/errors/bridge.errors';
import { StateManager } from '../../src/state/state-manager';

/**
 * AccountService 테스트
 *
 * 테스트 범위:
 * - 계정 조회 (없으면 UnknownAddress)
 * - 계정 생성 (번호 발급, AccountExists)
 * - Sequence 증가 (copy-on-write, checkpoint 롤백)
 * - openAccount (즉시 커밋)
 *
 * StateManager와 In-Memory 저장소는 실제 인스턴스 사용
 */
describe('AccountService', () => {
  let service: AccountService;
  let stateManager: StateManager;
  let repository: AccountMemoryRepository;

  const alice = '0x' + 'a1'.repeat(20);
  const bob = '0x' + 'b2'.repeat(20);

  beforeEach(async () => {
    repository = new AccountMemoryRepository();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        { provide: IAccountRepository, useValue: repository },
        StateManager,
        AccountService,
      ],
    }).compile();

    service = module.get<AccountService>(AccountService);
    stateManager = module.get<StateManager>(StateManager);
  });

  describe('계정 조회', () => {
    it('없는 계정은 UnknownAddressError를 던져야 함', async () => {
      await expect(service.getAccount(alice)).rejects.toThrow(
        new UnknownAddressError(alice),
      );
      await expect(service.getSequence(alice)).rejects.toMatchObject({
        code: ErrorCode.UnknownAddress,
        message: `account for address ${alice} not in state`,
      });
      await expect(service.getAccountNumber(alice)).rejects.toBeInstanceOf(
        UnknownAddressError,
      );
    });

    it('에러 메시지의 주소는 소문자여야 함', async () => {
      await expect(service.getAccount('0x' + 'A1'.repeat(20))).rejects.toThrow(
        `account for address ${alice} not in state`,
      );
    });

    it('findAccount는 없으면 null이어야 함', async () => {
      expect(await service.findAccount(alice)).toBeNull();
    });

    it('findAccount는 진행 중인 checkpoint의 쓰기를 보지 않아야 함', async () => {
      await repository.save(new Account(alice, 0, 5));
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const pending = stateManager.exclusive(async () => {
        stateManager.checkpoint();
        await service.incrementSequence(alice);
        await gate;
        stateManager.revertCheckpoint();
      });
      const found = service.findAccount(alice);

      await Promise.resolve();
      await Promise.resolve();
      release();

      await pending;
      expect((await found)?.sequence).toBe(5);
    });

    it('저장소에 있는 계정을 조회해야 함', async () => {
      await repository.save(new Account(alice, 4, 2));

      expect(await service.getSequence(alice)).toBe(2);
      expect(await service.getAccountNumber(alice)).toBe(4);
    });
  });

  describe('계정 생성', () => {
    it('번호를 차례로 발급하고 sequence 0으로 만들어야 함', async () => {
      const first = await service.createAccount(alice);
      const second = await service.createAccount(bob);

      expect(first.toJSON()).toEqual({ address: alice, accountNumber: 0, sequence: 0 });
      expect(second.toJSON()).toEqual({ address: bob, accountNumber: 1, sequence: 0 });
    });

    it('이미 있는 계정은 AccountExistsError를 던져야 함', async () => {
      await service.createAccount(alice);

      await expect(service.createAccount(alice)).rejects.toThrow(
        new AccountExistsError(alice),
      );
    });

    it('커밋 전에는 저장소에 쓰지 않아야 함', async () => {
      await service.createAccount(alice);

      expect(await repository.findByAddress(alice)).toBeNull();
    });
  });

  describe('Sequence 증가', () => {
    it('증가 후 sequence를 반환해야 함', async () => {
      await service.createAccount(alice);

      expect(await service.incrementSequence(alice)).toBe(1);
      expect(await service.incrementSequence(alice)).toBe(2);
      expect(await service.getSequence(alice)).toBe(2);
    });

    it('이전에 조회한 객체는 바뀌지 않아야 함', async () => {
      await repository.save(new Account(alice, 0, 5));
      const before = await service.getAccount(alice);

      await service.incrementSequence(alice);

      expect(before.sequence).toBe(5);
      expect(await service.getSequence(alice)).toBe(6);
    });

    it('checkpoint를 되돌리면 증가도 사라져야 함', async () => {
      await repository.save(new Account(alice, 0, 5));

      stateManager.checkpoint();
      await service.incrementSequence(alice);
      stateManager.revertCheckpoint();

      expect(await service.getSequence(alice)).toBe(5);
    });

    it('없는 계정은 UnknownAddressError를 던져야 함', async () => {
      await expect(service.incrementSequence(alice)).rejects.toBeInstanceOf(
        UnknownAddressError,
      );
    });
  });

  describe('setAccount', () => {
    it('복사본을 저널에 기록해야 함', async () => {
      const account = new Account(alice, 3, 1);

      await service.setAccount(account);
      account.incrementSequence();

      expect(await service.getSequence(alice)).toBe(1);
    });
  });

  describe('openAccount', () => {
    it('계정을 만들고 저장소까지 커밋해야 함', async () => {
      const account = await service.openAccount(alice);

      expect(account.accountNumber).toBe(0);
      expect((await repository.findByAddress(alice))?.toJSON()).toEqual({
        address: alice,
        accountNumber: 0,
        sequence: 0,
      });
      expect(stateManager.getJournalStats()).toEqual({ size: 0, depth: 0 });
    });

    it('중복이면 AccountExistsError를 던지고 저널을 남기지 않아야 함', async () => {
      await service.openAccount(alice);

      await expect(service.openAccount(alice)).rejects.toBeInstanceOf(
        AccountExistsError,
      );
      expect(stateManager.getJournalStats()).toEqual({ size: 0, depth: 0 });
    });

    it('저장 실패 시 저널을 비우고 번호는 건너뛰어야 함', async () => {
      jest
        .spyOn(repository, 'save')
        .mockRejectedValueOnce(new Error('disk full'));

      await expect(service.openAccount(alice)).rejects.toThrow('disk full');
      expect(stateManager.getJournalStats()).toEqual({ size: 0, depth: 0 });
      expect(await service.findAccount(alice)).toBeNull();

      const next = await service.openAccount(bob);
      expect(next.accountNumber).toBe(1);
    });

    it('동시에 열어도 번호가 겹치지 않아야 함', async () => {
      const [first, second] = await Promise.all([
        service.openAccount(alice),
        service.openAccount(bob),
      ]);

      expect([first.accountNumber, second.accountNumber]).toEqual([0, 1]);
    });
  });
});
