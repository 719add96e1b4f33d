import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString, Matches } from 'class-validator';

/**
 * 원시 트랜잭션 검증 요청 DTO
 */
export class ValidateTransactionRequestDto {
  @ApiProperty({
    description: 'RLP 인코딩된 서명 트랜잭션 (Hex String)',
    example: '0xf86c808504a817c800830186a094...',
  })
  @IsString()
  @IsNotEmpty()
  @Matches(/^(0x)?([0-9a-fA-F]{2})+$/, {
    message: 'raw must be a non-empty even-length hex string',
  })
  raw!: string;

  @ApiPropertyOptional({
    description: '컨텍스트 체인 ID (기본: 서버 설정)',
    example: '2',
  })
  @IsOptional()
  @IsString()
  chainId?: string;
}

/**
 * 검증 결과 응답 DTO
 *
 * 가스 값은 정밀도 보존을 위해 10진 문자열
 */
export class ValidateTransactionResponseDto {
  @ApiProperty({
    description: '트랜잭션 해시 (디코딩 실패 시 null)',
    example:
      '0x1234567890abcdef1234567890abcdef1234567890abcdef1234567890abcdef',
    nullable: true,
    type: String,
  })
  hash!: string | null;

  @ApiProperty({ description: '성공 여부', example: true })
  ok!: boolean;

  @ApiProperty({ description: '중단 여부 (실패 시 true)', example: false })
  abort!: boolean;

  @ApiProperty({ description: '결과 코드', example: 'OK' })
  code!: string;

  @ApiProperty({ description: '결과 메시지', example: '' })
  log!: string;

  @ApiProperty({ description: '요청한 가스 (gasLimit)', example: '100000' })
  gasWanted!: string;

  @ApiProperty({ description: '사용한 가스', example: '211' })
  gasUsed!: string;
}
