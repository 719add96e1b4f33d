import { ApiProperty } from '@nestjs/swagger';
import { IsString, Matches } from 'class-validator';

/**
 * 계정 정보 응답 DTO
 *
 * - address: 계정 주소 (소문자)
 * - accountNumber: 생성 순서대로 부여되는 고유 번호
 * - sequence: 임베디드 배치 서명마다 증가하는 카운터
 */
export class AccountDto {
  @ApiProperty({
    description: '계정 주소 (0x + 40자리 hex)',
    example: '0x1234567890123456789012345678901234567890',
  })
  address!: string;

  @ApiProperty({ description: '계정 번호', example: 0 })
  accountNumber!: number;

  @ApiProperty({ description: '시퀀스', example: 0 })
  sequence!: number;
}

/**
 * 계정 생성 요청 DTO
 */
export class CreateAccountRequestDto {
  @ApiProperty({
    description: '생성할 계정 주소 (0x + 40자리 hex)',
    example: '0x1234567890123456789012345678901234567890',
  })
  @IsString()
  @Matches(/^0x[a-fA-F0-9]{40}$/, {
    message: 'address must be a valid Ethereum address (0x + 40 hex characters)',
  })
  address!: string;
}
