import { Test, TestingModule } from '@nestjs/testing';
import { AccountModule } from '../../src/account/account.module';
import { AnteModule } from '../../src/ante/ante.module';
import { CommonModule } from '../../src/common/common.module';
import {
  BRIDGE_CONFIG,
  BridgeConfig,
  loadBridgeConfig,
} from '../../src/common/config/bridge.config';
import { CryptoService } from '../../src/common/crypto/crypto.service';
import { Address, PrivateKey } from '../../src/common/types/common.types';
import { EmbeddedModule } from '../../src/embedded/embedded.module';
import { EmbeddedBatch } from '../../src/embedded/entities/embedded-batch.entity';
import { StateModule } from '../../src/state/state.module';
import { StorageModule } from '../../src/storage/storage.module';
import { WireTransaction } from '../../src/transaction/entities/wire-transaction.entity';
import { TransactionModule } from '../../src/transaction/transaction.module';

/**
 * 테스트 공용 픽스처
 *
 * 개인키는 모두 자리표시자 값 (secp256k1 범위 안)
 */
export const KEY_A: PrivateKey = '0x' + '11'.repeat(32);
export const KEY_B: PrivateKey = '0x' + '22'.repeat(32);
export const KEY_C: PrivateKey = '0x' + '33'.repeat(32);

export const RECIPIENT: Address = '0x' + 'ab'.repeat(20);

/**
 * 환경 변수와 무관한 기본 설정 (chainId "2", 메모리 저장소)
 */
export function testConfig(
  env: Record<string, string | undefined> = {},
): Readonly<BridgeConfig> {
  return loadBridgeConfig(env);
}

/**
 * 앱 전체 모듈 그래프 (BRIDGE_CONFIG만 교체)
 */
export async function createBridgeTestingModule(
  config: Readonly<BridgeConfig> = testConfig(),
): Promise<TestingModule> {
  return Test.createTestingModule({
    imports: [
      CommonModule,
      StateModule,
      StorageModule,
      AccountModule,
      EmbeddedModule,
      AnteModule,
      TransactionModule,
    ],
  })
    .overrideProvider(BRIDGE_CONFIG)
    .useValue(config)
    .compile();
}

export interface TransferOptions {
  chainId?: bigint;
  gasLimit?: bigint | number;
  nonce?: number;
  amount?: bigint;
  payload?: Uint8Array;
}

/**
 * 서명된 와이어 트랜잭션
 */
export function signedTransfer(
  privateKey: PrivateKey,
  recipient: Address | null,
  options: TransferOptions = {},
): WireTransaction {
  const tx = WireTransaction.create({
    nonce: options.nonce ?? 0,
    recipient,
    amount: options.amount ?? 1000n,
    gasLimit: options.gasLimit ?? 100000,
    gasPrice: 1000000000n,
    payload: options.payload,
  });
  tx.sign(options.chainId ?? 2n, privateKey);
  return tx;
}

export interface EmbeddedSigner {
  privateKey: PrivateKey;
  accountNumber: number;
  sequence: number;
}

/**
 * 서명자별 서명 문서에 서명해서 배치에 붙임 (순서 = 서명자 순서)
 */
export function signEmbeddedBatch(
  crypto: CryptoService,
  batch: EmbeddedBatch,
  chainId: string,
  signers: EmbeddedSigner[],
): EmbeddedBatch {
  return batch.withSignatures(
    signers.map((signer) =>
      crypto.signCompact(
        crypto.keccak256(
          batch.signBytes(chainId, signer.accountNumber, signer.sequence),
        ),
        signer.privateKey,
      ),
    ),
  );
}
