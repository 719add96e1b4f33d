import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { NestedUint8Array } from '@ethereumjs/rlp';
import { ClassicLevel } from 'classic-level';
import { LRUCache } from 'lru-cache';
import { BRIDGE_CONFIG, BridgeConfig } from '../../common/config/bridge.config';
import { CryptoService } from '../../common/crypto/crypto.service';
import { AccountRecordError } from '../../common/errors/bridge.errors';
import { Address, normalizeAddress } from '../../common/types/common.types';
import {
  decodeUint,
  expectBytes,
  expectList,
} from '../../transaction/codec/rlp.codec';
import { Account } from '../entities/account.entity';
import { IAccountRepository } from './account.repository.interface';

const ACCOUNT_PREFIX = 'account:';
const NEXT_ACCOUNT_NUMBER_KEY = 'meta:nextAccountNumber';

/**
 * AccountLevelDBRepository
 *
 * 저장 키:
 * - "account:" + address → hex(RLP([accountNumber, sequence]))
 * - "meta:nextAccountNumber" → 다음 계정 번호 (10진 문자열)
 *
 * 조회한 계정은 LRU 캐싱 (최근 10,000개)
 */
@Injectable()
export class AccountLevelDBRepository
  extends IAccountRepository
  implements OnModuleInit, OnModuleDestroy
{
  private readonly logger = new Logger(AccountLevelDBRepository.name);
  private readonly db: ClassicLevel<string, string>;
  private readonly cache: LRUCache<Address, Account>;
  private nextAccountNumber = 0;

  constructor(
    private readonly cryptoService: CryptoService,
    @Inject(BRIDGE_CONFIG) config: Readonly<BridgeConfig>,
  ) {
    super();
    const path = config.accountDbPath ?? './data/accounts';
    this.db = new ClassicLevel<string, string>(path, {
      valueEncoding: 'utf8',
    });
    this.cache = new LRUCache<Address, Account>({ max: 10000 });
  }

  async onModuleInit(): Promise<void> {
    try {
      await this.db.open();
      const stored = await this.getOrNull(NEXT_ACCOUNT_NUMBER_KEY);
      this.nextAccountNumber = stored === null ? 0 : Number(stored);
      this.logger.log(`Account LevelDB opened: ${this.db.location}`);
    } catch (error: unknown) {
      this.logger.error('Failed to open account LevelDB', error);
      throw error;
    }
  }

  async onModuleDestroy(): Promise<void> {
    try {
      await this.db.close();
    } catch (error: unknown) {
      this.logger.error('Failed to close account LevelDB', error);
      throw error;
    }
  }

  async findByAddress(address: Address): Promise<Account | null> {
    const normalized = normalizeAddress(address);
    const cached = this.cache.get(normalized);
    if (cached) {
      return cached.clone();
    }

    const value = await this.getOrNull(ACCOUNT_PREFIX + normalized);
    if (value === null) {
      return null;
    }

    const account = this.deserialize(normalized, value);
    this.cache.set(normalized, account);
    return account.clone();
  }

  async save(account: Account): Promise<void> {
    await this.db.put(ACCOUNT_PREFIX + account.address, this.serialize(account));
    this.cache.set(account.address, account.clone());
  }

  /**
   * 카운터는 메모리에서 먼저 증가시키고 저장 (동시 호출이 같은 번호를 받지 않도록)
   */
  async allocateAccountNumber(): Promise<number> {
    const accountNumber = this.nextAccountNumber++;
    await this.db.put(NEXT_ACCOUNT_NUMBER_KEY, String(this.nextAccountNumber));
    return accountNumber;
  }

  private serialize(account: Account): string {
    const encoded = this.cryptoService.rlpEncode([
      account.accountNumber,
      account.sequence,
    ]);
    return Buffer.from(encoded).toString('hex');
  }

  /**
   * @throws {AccountRecordError} 저장된 값이 계정 레코드로 해석되지 않을 때
   */
  private deserialize(address: Address, value: string): Account {
    try {
      const fields = expectList(
        this.cryptoService.rlpDecode(Buffer.from(value, 'hex')),
        'account',
      );
      return new Account(
        address,
        toSafeNumber(fields[0], 'accountNumber'),
        toSafeNumber(fields[1], 'sequence'),
      );
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new AccountRecordError(address, reason);
    }
  }

  private async getOrNull(key: string): Promise<string | null> {
    try {
      return await this.db.get(key);
    } catch (error: unknown) {
      if (isNotFoundError(error)) {
        return null;
      }
      this.logger.error(`Failed to read ${key}`, error);
      throw error;
    }
  }
}

function toSafeNumber(
  field: Uint8Array | NestedUint8Array | undefined,
  name: string,
): number {
  const value = decodeUint(expectBytes(field, name), name, 8);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new Error(`${name} exceeds safe integer range: ${value}`);
  }
  return Number(value);
}

function isNotFoundError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'LEVEL_NOT_FOUND'
  );
}
