import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Get,
  NotFoundException,
  Param,
  Post,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CryptoService } from '../common/crypto/crypto.service';
import { AccountExistsError } from '../common/errors/bridge.errors';
import { isValidAddress } from '../common/types/common.types';
import { AccountService } from './account.service';
import { AccountDto, CreateAccountRequestDto } from './dto/account.dto';
import { CreateWalletResponseDto } from './dto/create-wallet.dto';

/**
 * AccountController
 *
 * 제공하는 API:
 * - POST /account: 주소로 계정 생성
 * - POST /account/create-wallet: 새 지갑 생성 (개인키 + 주소) 후 계정 등록 (테스트용)
 * - GET /account/:address: 계정 정보 조회 (주소, 계정 번호, 시퀀스)
 */
@ApiTags('account')
@Controller('account')
export class AccountController {
  constructor(
    private readonly accountService: AccountService,
    private readonly cryptoService: CryptoService,
  ) {}

  /**
   * 계정 생성
   *
   * 임베디드 배치의 서명자는 미리 계정이 있어야 함 (없으면 UnknownAddress로 거부)
   *
   * POST /account
   */
  @Post()
  @ApiOperation({
    summary: '계정 생성',
    description: '주소에 계정을 만들고 계정 번호를 부여합니다. (sequence = 0)',
  })
  @ApiResponse({ status: 201, description: '계정 생성 성공', type: AccountDto })
  @ApiResponse({ status: 409, description: '이미 존재하는 계정' })
  async createAccount(@Body() body: CreateAccountRequestDto): Promise<AccountDto> {
    try {
      const account = await this.accountService.openAccount(body.address);
      return account.toJSON();
    } catch (error: unknown) {
      if (error instanceof AccountExistsError) {
        throw new ConflictException(error.message);
      }
      throw error;
    }
  }

  /**
   * 새 지갑 생성 (테스트용)
   *
   * 실제로는 클라이언트가 로컬에서 키를 만들어야 함
   *
   * POST /account/create-wallet
   */
  @Post('create-wallet')
  @ApiOperation({
    summary: '새 지갑 생성',
    description:
      '새로운 키 쌍을 만들고 계정을 등록합니다. (주의: 실제 프로덕션에서는 클라이언트에서 생성해야 합니다)',
  })
  @ApiResponse({
    status: 201,
    description: '지갑이 성공적으로 생성됨',
    type: CreateWalletResponseDto,
  })
  async createWallet(): Promise<CreateWalletResponseDto> {
    const keyPair = this.cryptoService.generateKeyPair();
    const account = await this.accountService.openAccount(keyPair.address);

    return {
      privateKey: keyPair.privateKey,
      publicKey: keyPair.publicKey,
      address: account.address,
      accountNumber: account.accountNumber,
      sequence: account.sequence,
    };
  }

  /**
   * 특정 주소의 계정 정보 조회
   *
   * GET /account/:address
   */
  @Get(':address')
  @ApiOperation({
    summary: '계정 정보 조회',
    description: '특정 주소의 계정 정보(주소, 계정 번호, 시퀀스)를 조회합니다.',
  })
  @ApiParam({
    name: 'address',
    description: '조회할 계정 주소 (0x로 시작하는 40자리 hex)',
    example: '0x1234567890123456789012345678901234567890',
  })
  @ApiResponse({ status: 200, description: '계정 정보 조회 성공', type: AccountDto })
  @ApiResponse({ status: 404, description: '계정 없음' })
  async getAccount(@Param('address') address: string): Promise<AccountDto> {
    if (!isValidAddress(address)) {
      throw new BadRequestException(`Invalid address: ${address}`);
    }

    const account = await this.accountService.findAccount(address);
    if (!account) {
      throw new NotFoundException(`Account not found: ${address}`);
    }
    return account.toJSON();
  }
}
