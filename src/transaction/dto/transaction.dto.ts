import { ApiProperty } from '@nestjs/swagger';

/**
 * 트랜잭션 정보 응답 DTO - Ethereum JSON-RPC 표준
 *
 * 정수 필드는 모두 Hex String
 */
export class TransactionDto {
  @ApiProperty({
    description: '트랜잭션 해시',
    example:
      '0x1234567890abcdef1234567890abcdef1234567890abcdef1234567890abcdef',
  })
  hash!: string;

  @ApiProperty({ description: '논스 (Hex String)', example: '0x5' })
  nonce!: string;

  @ApiProperty({ description: '가스 가격 (Hex String)', example: '0x3b9aca00' })
  gasPrice!: string;

  @ApiProperty({ description: '가스 한도 (Hex String)', example: '0x186a0' })
  gas!: string;

  @ApiProperty({
    description: '수신자 주소 (컨트랙트 생성이면 null)',
    example: '0x1234567890123456789012345678901234567890',
    nullable: true,
    type: String,
  })
  to!: string | null;

  @ApiProperty({
    description: '송금 금액 (Wei, Hex String)',
    example: '0xde0b6b3a7640000',
  })
  value!: string;

  @ApiProperty({ description: 'payload (Hex String)', example: '0x' })
  input!: string;

  @ApiProperty({ description: '서명 v (Hex String)', example: '0x27' })
  v!: string;

  @ApiProperty({
    description: '서명 r (Hex String)',
    example:
      '0x1234567890abcdef1234567890abcdef1234567890abcdef1234567890abcdef',
  })
  r!: string;

  @ApiProperty({
    description: '서명 s (Hex String)',
    example:
      '0x1234567890abcdef1234567890abcdef1234567890abcdef1234567890abcdef',
  })
  s!: string;
}
