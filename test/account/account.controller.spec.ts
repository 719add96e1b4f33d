import {
  BadRequestException,
  ConflictException,
  NotFoundException,
} from '@nestjs/common';
import { TestingModule } from '@nestjs/testing';
import { AccountController } from '../../src/account/account.controller';
import { CryptoService } from '../../src/common/crypto/crypto.service';
import { createBridgeTestingModule } from '../helpers/bridge-fixtures';

/**
 * AccountController 테스트
 *
 * 테스트 범위:
 * - POST /account (생성, 중복 → 409)
 * - POST /account/create-wallet
 * - GET /account/:address (400 / 404)
 */
describe('AccountController', () => {
  let module: TestingModule;
  let controller: AccountController;
  let cryptoService: CryptoService;

  const address = '0x' + 'c3'.repeat(20);

  beforeEach(async () => {
    module = await createBridgeTestingModule();
    controller = module.get<AccountController>(AccountController);
    cryptoService = module.get<CryptoService>(CryptoService);
  });

  afterEach(async () => {
    await module.close();
  });

  describe('createAccount', () => {
    it('계정을 생성해야 함', async () => {
      const result = await controller.createAccount({ address });

      expect(result).toEqual({ address, accountNumber: 0, sequence: 0 });
    });

    it('대문자 주소도 소문자로 저장해야 함', async () => {
      const result = await controller.createAccount({
        address: '0x' + 'C3'.repeat(20),
      });

      expect(result.address).toBe(address);
    });

    it('이미 있는 계정이면 ConflictException을 던져야 함', async () => {
      await controller.createAccount({ address });

      await expect(controller.createAccount({ address })).rejects.toThrow(
        new ConflictException(`account for address ${address} already exists`),
      );
    });
  });

  describe('createWallet', () => {
    it('키 쌍을 만들고 계정을 등록해야 함', async () => {
      const result = await controller.createWallet();

      expect(result.address).toBe(
        cryptoService.privateKeyToAddress(result.privateKey),
      );
      expect(result.accountNumber).toBe(0);
      expect(result.sequence).toBe(0);
      expect(await controller.getAccount(result.address)).toEqual({
        address: result.address,
        accountNumber: 0,
        sequence: 0,
      });
    });
  });

  describe('getAccount', () => {
    it('계정을 조회해야 함', async () => {
      await controller.createAccount({ address });

      expect(await controller.getAccount(address)).toEqual({
        address,
        accountNumber: 0,
        sequence: 0,
      });
    });

    it('없는 계정이면 NotFoundException을 던져야 함', async () => {
      await expect(controller.getAccount(address)).rejects.toThrow(
        NotFoundException,
      );
    });

    it('잘못된 주소면 BadRequestException을 던져야 함', async () => {
      await expect(controller.getAccount('0x1234')).rejects.toThrow(
        new BadRequestException('Invalid address: 0x1234'),
      );
    });
  });
});
