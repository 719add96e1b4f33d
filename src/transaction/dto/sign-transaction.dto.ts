import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Min,
} from 'class-validator';
import { TransactionDto } from './transaction.dto';

/**
 * 트랜잭션 서명 요청 DTO (테스트용)
 *
 * ⚠️ 주의:
 * - 실제 프로덕션에서는 절대 사용 금지
 * - 개인키를 서버로 보내면 안됨
 * - 오직 개발/테스트 목적
 */
export class SignTransactionRequestDto {
  @ApiProperty({
    description: '개인키 (⚠️ 테스트용만! 실제로는 클라이언트에서 서명)',
    example:
      '0x1234567890abcdef1234567890abcdef1234567890abcdef1234567890abcdef',
  })
  @IsString()
  @IsNotEmpty()
  @Matches(/^0x[a-fA-F0-9]{64}$/, {
    message: 'privateKey must be a valid private key (0x + 64 hex characters)',
  })
  privateKey!: string;

  @ApiPropertyOptional({
    description: '수신자 주소 (생략 시 컨트랙트 생성)',
    example: '0x742d35cc6634c0532925a3b844bc9e7595f0beb0',
  })
  @IsOptional()
  @Matches(/^0x[a-fA-F0-9]{40}$/, {
    message: 'to must be a valid Ethereum address (0x + 40 hex characters)',
  })
  to?: string;

  @ApiProperty({
    description: '송금 금액 (Wei 단위)',
    example: '1000000000000000000',
  })
  @IsString()
  @IsNotEmpty()
  @Matches(/^[1-9]\d*$/, {
    message: 'value must be a positive integer string',
  })
  value!: string;

  @ApiPropertyOptional({ description: '논스', example: 0 })
  @IsOptional()
  @IsInt()
  @Min(0)
  nonce?: number;

  @ApiPropertyOptional({ description: '가스 가격 (Wei)', example: '1000000000' })
  @IsOptional()
  @Matches(/^[1-9]\d*$/, {
    message: 'gasPrice must be a positive integer string',
  })
  gasPrice?: string;

  @ApiPropertyOptional({ description: '가스 한도', example: '100000' })
  @IsOptional()
  @Matches(/^\d+$/, {
    message: 'gasLimit must be a non-negative integer string',
  })
  gasLimit?: string;

  @ApiPropertyOptional({
    description: 'payload (Hex String). 예약 주소로 보낼 때는 EmbeddedBatch 인코딩',
    example: '0x',
  })
  @IsOptional()
  @Matches(/^0x([0-9a-fA-F]{2})*$/, {
    message: 'data must be an even-length hex string with 0x prefix',
  })
  data?: string;

  @ApiPropertyOptional({
    description: '서명에 사용할 체인 ID (기본: 서버 설정)',
    example: '2',
  })
  @IsOptional()
  @Matches(/^\d+$/, { message: 'chainId must be a decimal integer string' })
  chainId?: string;
}

/**
 * 트랜잭션 서명 응답 DTO
 */
export class SignTransactionResponseDto {
  @ApiProperty({
    description: 'RLP 인코딩된 서명 트랜잭션 (Hex String)',
    example: '0xf86c808504a817c800830186a094...',
  })
  raw!: string;

  @ApiProperty({
    description: '서명한 계정 주소',
    example: '0x742d35cc6634c0532925a3b844bc9e7595f0beb0',
  })
  from!: string;

  @ApiProperty({ description: '트랜잭션 필드', type: TransactionDto })
  transaction!: TransactionDto;
}
