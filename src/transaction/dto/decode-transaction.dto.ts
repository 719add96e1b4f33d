import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, Matches } from 'class-validator';

/**
 * 원시 트랜잭션 디코딩 요청 DTO
 */
export class DecodeTransactionRequestDto {
  @ApiProperty({
    description: 'RLP 인코딩된 트랜잭션 (Hex String)',
    example: '0xf86c808504a817c800830186a094...',
  })
  @IsString()
  @IsNotEmpty()
  @Matches(/^(0x)?([0-9a-fA-F]{2})+$/, {
    message: 'raw must be a non-empty even-length hex string',
  })
  raw!: string;
}
