import { ArrayNotEmpty, Matches, ValidateNested } from 'class-validator';
import {
  DecodeFailureError,
  InvalidValueError,
} from '../../common/errors/bridge.errors';
import { Address, normalizeAddress } from '../../common/types/common.types';
import { Msg } from '../../transaction/entities/tx.types';
import {
  ADDRESS_PATTERN,
  assertValid,
  decodeJsonBody,
  encodeJsonBody,
  isRecord,
  POSITIVE_INTEGER_PATTERN,
  requireString,
} from './msg.codec';

export type TransferLegJson = {
  address: string;
  amount: string;
};

export type MsgMultiSendJson = {
  inputs: TransferLegJson[];
  outputs: TransferLegJson[];
};

export class TransferLeg {
  @Matches(ADDRESS_PATTERN, {
    message: 'address must be a valid address (0x + 40 hex characters)',
  })
  readonly address: string;

  @Matches(POSITIVE_INTEGER_PATTERN, {
    message: 'amount must be a positive integer string',
  })
  readonly amount: string;

  constructor(address: string, amount: string) {
    this.address = address;
    this.amount = amount;
  }
}

export class MsgMultiSendValue {
  @ArrayNotEmpty({ message: 'inputs must not be empty' })
  @ValidateNested({ each: true })
  readonly inputs: TransferLeg[];

  @ArrayNotEmpty({ message: 'outputs must not be empty' })
  @ValidateNested({ each: true })
  readonly outputs: TransferLeg[];

  constructor(inputs: TransferLeg[], outputs: TransferLeg[]) {
    this.inputs = inputs;
    this.outputs = outputs;
  }
}

/**
 * MsgMultiSend: 다중 입력/출력 송금 ("bank/multisend")
 *
 * 서명자 = inputs의 주소들 (입력 순서 그대로, 중복 제거는 배치 단위에서)
 * 입력 합계와 출력 합계가 같아야 함
 */
export class MsgMultiSend implements Msg {
  static readonly TYPE = 'bank/multisend';

  constructor(readonly value: MsgMultiSendValue) {}

  static create(
    inputs: Array<{ address: Address; amount: bigint }>,
    outputs: Array<{ address: Address; amount: bigint }>,
  ): MsgMultiSend {
    const toLeg = (leg: { address: Address; amount: bigint }) =>
      new TransferLeg(leg.address, leg.amount.toString());
    return new MsgMultiSend(
      new MsgMultiSendValue(inputs.map(toLeg), outputs.map(toLeg)),
    );
  }

  /**
   * @throws {DecodeFailureError}
   */
  static decode(body: Uint8Array): MsgMultiSend {
    const json = decodeJsonBody(body, MsgMultiSend.TYPE);
    return new MsgMultiSend(
      new MsgMultiSendValue(
        MsgMultiSend.decodeLegs(json.inputs, 'inputs'),
        MsgMultiSend.decodeLegs(json.outputs, 'outputs'),
      ),
    );
  }

  private static decodeLegs(value: unknown, field: string): TransferLeg[] {
    if (!Array.isArray(value)) {
      throw new DecodeFailureError(
        `${MsgMultiSend.TYPE}: field "${field}" must be an array`,
      );
    }
    return value.map((item: unknown, index: number) => {
      if (!isRecord(item)) {
        throw new DecodeFailureError(
          `${MsgMultiSend.TYPE}: ${field}[${index}] must be an object`,
        );
      }
      return new TransferLeg(
        requireString(item, 'address', MsgMultiSend.TYPE),
        requireString(item, 'amount', MsgMultiSend.TYPE),
      );
    });
  }

  type(): string {
    return MsgMultiSend.TYPE;
  }

  getSigners(): Address[] {
    return this.value.inputs.map((input) => normalizeAddress(input.address));
  }

  getSignBytes(): Uint8Array {
    return encodeJsonBody({ type: MsgMultiSend.TYPE, value: this.toJSON() });
  }

  validateBasic(): void {
    assertValid(this.value, MsgMultiSend.TYPE);

    const sum = (legs: TransferLeg[]) =>
      legs.reduce((total, leg) => total + BigInt(leg.amount), 0n);
    if (sum(this.value.inputs) !== sum(this.value.outputs)) {
      throw new InvalidValueError(
        `${MsgMultiSend.TYPE}: sum of inputs does not match sum of outputs`,
      );
    }
  }

  encode(): Uint8Array {
    return encodeJsonBody(this.toJSON());
  }

  toJSON(): MsgMultiSendJson {
    const toJson = (leg: TransferLeg): TransferLegJson => ({
      address: leg.address,
      amount: leg.amount,
    });
    return {
      inputs: this.value.inputs.map(toJson),
      outputs: this.value.outputs.map(toJson),
    };
  }
}
