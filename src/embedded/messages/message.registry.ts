import { Injectable, Logger } from '@nestjs/common';
import { NestedUint8Array, RLP } from '@ethereumjs/rlp';
import { TYPE_TX_ETHEREUM } from '../../common/constants/bridge.constants';
import { DecodeFailureError } from '../../common/errors/bridge.errors';
import { expectBytes, expectList } from '../../transaction/codec/rlp.codec';
import { Msg } from '../../transaction/entities/tx.types';
import { WireTransaction } from '../../transaction/entities/wire-transaction.entity';
import { EmbeddedBatch } from '../entities/embedded-batch.entity';
import { MsgMultiSend } from './msg-multi-send.msg';
import { MsgSend } from './msg-send.msg';
import { bytesToUtf8 } from './msg.codec';

export type MsgDecoder = (body: Uint8Array) => Msg;

/**
 * MessageRegistry
 *
 * 메시지 타입 태그 → 디코더.
 * 새 메시지 종류는 Msg를 구현하고 여기에 등록하면 됨.
 *
 * 기본 등록:
 * - bank/send, bank/multisend
 * - Ethereum: 외부 체인 트랜잭션. 배치 안에 중첩된 경우를 감지해서 거부하려고 디코딩만 지원
 */
@Injectable()
export class MessageRegistry {
  private readonly logger = new Logger(MessageRegistry.name);
  private readonly decoders = new Map<string, MsgDecoder>();

  constructor() {
    this.register(MsgSend.TYPE, (body) => MsgSend.decode(body));
    this.register(MsgMultiSend.TYPE, (body) => MsgMultiSend.decode(body));
    this.register(TYPE_TX_ETHEREUM, (body) => WireTransaction.decode(body));
  }

  /**
   * 메시지 타입 등록
   *
   * 같은 타입을 두 번 등록하면 에러 (디코더 덮어쓰기 방지)
   */
  register(type: string, decoder: MsgDecoder): void {
    if (this.decoders.has(type)) {
      throw new Error(`message type already registered: ${type}`);
    }
    this.decoders.set(type, decoder);
    this.logger.debug(`Registered message type: ${type}`);
  }

  /**
   * @throws {DecodeFailureError} 등록되지 않은 타입이거나 본문이 잘못됨
   */
  decodeMsg(type: string, body: Uint8Array): Msg {
    const decoder = this.decoders.get(type);
    if (!decoder) {
      throw new DecodeFailureError(`unrecognized message type: ${type}`);
    }
    return decoder(body);
  }

  /**
   * payload 바이트 → EmbeddedBatch
   *
   * @throws {DecodeFailureError}
   */
  decodeBatch(bytes: Uint8Array): EmbeddedBatch {
    let decoded: Uint8Array | NestedUint8Array;
    try {
      decoded = RLP.decode(bytes);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DecodeFailureError(`invalid embedded batch encoding: ${reason}`);
    }

    const fields = expectList(decoded, 'embedded batch');
    if (fields.length !== 2) {
      throw new DecodeFailureError(
        `invalid embedded batch encoding: expected 2 fields, got ${fields.length}`,
      );
    }

    const messages = expectList(fields[0], 'msgs').map((entry, index) => {
      const pair = expectList(entry, `msgs[${index}]`);
      if (pair.length !== 2) {
        throw new DecodeFailureError(
          `invalid embedded batch encoding: msgs[${index}] must be [type, body]`,
        );
      }
      const type = bytesToUtf8(
        expectBytes(pair[0], `msgs[${index}].type`),
        `msgs[${index}].type`,
      );
      return this.decodeMsg(type, expectBytes(pair[1], `msgs[${index}].body`));
    });

    const signatures = expectList(fields[1], 'signatures').map(
      (signature, index) => expectBytes(signature, `signatures[${index}]`),
    );

    return new EmbeddedBatch(messages, signatures);
  }
}
