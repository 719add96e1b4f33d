import { Matches } from 'class-validator';
import { Address, normalizeAddress } from '../../common/types/common.types';
import { Msg } from '../../transaction/entities/tx.types';
import {
  ADDRESS_PATTERN,
  assertValid,
  decodeJsonBody,
  encodeJsonBody,
  POSITIVE_INTEGER_PATTERN,
  requireString,
} from './msg.codec';

export type MsgSendJson = {
  fromAddress: string;
  toAddress: string;
  amount: string;
};

/**
 * MsgSend 본문 (class-validator 규칙 포함)
 *
 * amount는 정밀도 보존을 위해 10진 문자열
 */
export class MsgSendValue {
  @Matches(ADDRESS_PATTERN, {
    message: 'fromAddress must be a valid address (0x + 40 hex characters)',
  })
  readonly fromAddress: string;

  @Matches(ADDRESS_PATTERN, {
    message: 'toAddress must be a valid address (0x + 40 hex characters)',
  })
  readonly toAddress: string;

  @Matches(POSITIVE_INTEGER_PATTERN, {
    message: 'amount must be a positive integer string',
  })
  readonly amount: string;

  constructor(fromAddress: string, toAddress: string, amount: string) {
    this.fromAddress = fromAddress;
    this.toAddress = toAddress;
    this.amount = amount;
  }
}

/**
 * MsgSend: 단일 송금 메시지 ("bank/send")
 *
 * 서명자는 보내는 쪽 한 명. 실제 잔액 이동은 외부 실행 계층 담당이고,
 * 여기서는 인가에 필요한 능력(서명자, 서명 바이트, 자체 검증)만 제공.
 */
export class MsgSend implements Msg {
  static readonly TYPE = 'bank/send';

  constructor(readonly value: MsgSendValue) {}

  static create(from: Address, to: Address, amount: bigint): MsgSend {
    return new MsgSend(new MsgSendValue(from, to, amount.toString()));
  }

  /**
   * @throws {DecodeFailureError}
   */
  static decode(body: Uint8Array): MsgSend {
    const json = decodeJsonBody(body, MsgSend.TYPE);
    return new MsgSend(
      new MsgSendValue(
        requireString(json, 'fromAddress', MsgSend.TYPE),
        requireString(json, 'toAddress', MsgSend.TYPE),
        requireString(json, 'amount', MsgSend.TYPE),
      ),
    );
  }

  type(): string {
    return MsgSend.TYPE;
  }

  getSigners(): Address[] {
    return [normalizeAddress(this.value.fromAddress)];
  }

  getSignBytes(): Uint8Array {
    return encodeJsonBody({ type: MsgSend.TYPE, value: this.toJSON() });
  }

  validateBasic(): void {
    assertValid(this.value, MsgSend.TYPE);
  }

  encode(): Uint8Array {
    return encodeJsonBody(this.toJSON());
  }

  toJSON(): MsgSendJson {
    return {
      fromAddress: this.value.fromAddress,
      toAddress: this.value.toAddress,
      amount: this.value.amount,
    };
  }
}
