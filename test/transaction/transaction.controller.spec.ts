import { BadRequestException } from '@nestjs/common';
import { TestingModule } from '@nestjs/testing';
import { CryptoService } from '../../src/common/crypto/crypto.service';
import { TransactionController } from '../../src/transaction/transaction.controller';
import {
  createBridgeTestingModule,
  KEY_A,
  RECIPIENT,
  signedTransfer,
} from '../helpers/bridge-fixtures';

/**
 * TransactionController 테스트
 *
 * 테스트 범위:
 * - POST /transaction/validate (가스 값은 10진 문자열)
 * - POST /transaction/sign
 * - POST /transaction/decode (실패 시 400)
 */
describe('TransactionController', () => {
  let module: TestingModule;
  let controller: TransactionController;
  let crypto: CryptoService;

  beforeEach(async () => {
    module = await createBridgeTestingModule();
    controller = module.get<TransactionController>(TransactionController);
    crypto = module.get<CryptoService>(CryptoService);
  });

  afterEach(async () => {
    await module.close();
  });

  describe('validateTransaction', () => {
    it('통과 결과를 문자열 가스 값으로 반환해야 함', async () => {
      const tx = signedTransfer(KEY_A, RECIPIENT);

      const result = await controller.validateTransaction({
        raw: crypto.bytesToHex(tx.encode()),
      });

      expect(result).toEqual({
        hash: tx.hash(),
        ok: true,
        abort: false,
        code: 'OK',
        log: `transfer from ${crypto.privateKeyToAddress(KEY_A)} accepted`,
        gasWanted: '100000',
        gasUsed: String(tx.size() + 100),
      });
    });

    it('거부도 정상 응답으로 반환해야 함', async () => {
      const result = await controller.validateTransaction({ raw: '0x01' });

      expect(result).toEqual({
        hash: null,
        ok: false,
        abort: true,
        code: 'DECODE_FAILURE',
        log: 'rlp: expected input list for transaction',
        gasWanted: '0',
        gasUsed: '0',
      });
    });

    it('요청의 체인 ID로 검증해야 함', async () => {
      const tx = signedTransfer(KEY_A, RECIPIENT);

      const result = await controller.validateTransaction({
        raw: crypto.bytesToHex(tx.encode()),
        chainId: 'abc',
      });

      expect(result.code).toBe('INVALID_CHAIN_ID');
      expect(result.log).toBe('invalid chainID: "abc"');
    });
  });

  describe('signTransaction', () => {
    it('서명된 원시 트랜잭션을 반환해야 함', () => {
      const result = controller.signTransaction({
        privateKey: KEY_A,
        to: RECIPIENT,
        value: '1000',
        gasLimit: '50000',
      });

      expect(result.from).toBe(crypto.privateKeyToAddress(KEY_A));
      expect(result.transaction).toMatchObject({
        to: RECIPIENT,
        value: '0x3e8',
        gas: '0xc350',
        gasPrice: '0x3b9aca00',
      });
      expect(controller.decodeTransaction({ raw: result.raw })).toEqual(
        result.transaction,
      );
    });

    it('잘못된 개인키는 BadRequestException이어야 함', () => {
      expect(() =>
        controller.signTransaction({
          privateKey: '0x' + '0'.repeat(64),
          value: '1',
        }),
      ).toThrow(new BadRequestException('invalid private key'));
    });
  });

  describe('decodeTransaction', () => {
    it('디코딩 실패는 BadRequestException이어야 함', () => {
      expect(() => controller.decodeTransaction({ raw: '0x01' })).toThrow(
        new BadRequestException('rlp: expected input list for transaction'),
      );
    });
  });
});
