import { BadRequestException, Body, Controller, HttpCode, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { BridgeError } from '../common/errors/bridge.errors';
import { DecodeTransactionRequestDto } from './dto/decode-transaction.dto';
import {
  SignTransactionRequestDto,
  SignTransactionResponseDto,
} from './dto/sign-transaction.dto';
import { TransactionDto } from './dto/transaction.dto';
import {
  ValidateTransactionRequestDto,
  ValidateTransactionResponseDto,
} from './dto/validate-transaction.dto';
import { TransactionService } from './transaction.service';

/**
 * Transaction Controller
 *
 * API:
 * - POST /transaction/validate: 원시 트랜잭션 검증 (통과 시 상태 커밋)
 * - POST /transaction/sign: 트랜잭션 서명 (테스트용)
 * - POST /transaction/decode: 원시 트랜잭션 디코딩
 */
@ApiTags('transaction')
@Controller('transaction')
export class TransactionController {
  constructor(private readonly transactionService: TransactionService) {}

  /**
   * 원시 트랜잭션 검증
   *
   * 거부도 정상 응답(200)으로 반환. 실패 종류는 code/log에 담김.
   *
   * POST /transaction/validate
   */
  @Post('validate')
  @HttpCode(200)
  @ApiOperation({
    summary: '원시 트랜잭션 검증',
    description:
      '서명 복구, 가스 계량, 임베디드 배치 인가를 거쳐 결과를 반환합니다. 통과하면 sequence 변경이 커밋됩니다.',
  })
  @ApiResponse({
    status: 200,
    description: '검증 결과 (abort=true 이면 거부)',
    type: ValidateTransactionResponseDto,
  })
  async validateTransaction(
    @Body() body: ValidateTransactionRequestDto,
  ): Promise<ValidateTransactionResponseDto> {
    const { hash, outcome } = await this.transactionService.submitRaw(
      body.raw,
      body.chainId,
    );

    return {
      hash,
      ok: outcome.result.ok,
      abort: outcome.abort,
      code: outcome.result.code,
      log: outcome.result.log,
      gasWanted: outcome.result.gasWanted.toString(),
      gasUsed: outcome.result.gasUsed.toString(),
    };
  }

  /**
   * 트랜잭션 서명 생성 (테스트용)
   *
   * ⚠️ 실제 프로덕션 금지. 서명은 클라이언트에서 해야 함
   *
   * POST /transaction/sign
   */
  @Post('sign')
  @ApiOperation({
    summary: '트랜잭션 서명 생성 (테스트용)',
    description:
      '개인키로 트랜잭션을 만들고 EIP-155로 서명합니다. ⚠️ 실제 프로덕션에서는 절대 사용 금지!',
  })
  @ApiResponse({
    status: 201,
    description: '서명된 트랜잭션 반환',
    type: SignTransactionResponseDto,
  })
  signTransaction(
    @Body() body: SignTransactionRequestDto,
  ): SignTransactionResponseDto {
    const { privateKey, to, value, nonce, gasPrice, gasLimit, data, chainId } =
      body;

    try {
      const { tx, raw, from } = this.transactionService.signTransaction(
        privateKey,
        to ?? null,
        BigInt(value),
        {
          nonce,
          data,
          gasPrice: gasPrice ? BigInt(gasPrice) : undefined,
          gasLimit: gasLimit ? BigInt(gasLimit) : undefined,
          chainId,
        },
      );

      return { raw, from, transaction: tx.toJSON() };
    } catch (error: unknown) {
      if (error instanceof BridgeError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  /**
   * 원시 트랜잭션 디코딩
   *
   * POST /transaction/decode
   */
  @Post('decode')
  @HttpCode(200)
  @ApiOperation({
    summary: '원시 트랜잭션 디코딩',
    description: 'RLP 인코딩된 트랜잭션을 필드별로 풀어서 반환합니다.',
  })
  @ApiResponse({ status: 200, type: TransactionDto })
  @ApiResponse({ status: 400, description: '디코딩 실패' })
  decodeTransaction(@Body() body: DecodeTransactionRequestDto): TransactionDto {
    try {
      return this.transactionService.decodeRaw(body.raw).toJSON();
    } catch (error: unknown) {
      if (error instanceof BridgeError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }
}
