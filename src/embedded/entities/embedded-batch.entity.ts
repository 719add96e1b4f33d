import { RLP } from '@ethereumjs/rlp';
import { Address, normalizeAddress } from '../../common/types/common.types';
import { Msg, Tx } from '../../transaction/entities/tx.types';
import { bytesToUtf8, utf8ToBytes } from '../messages/msg.codec';

/**
 * EmbeddedBatch
 *
 * 예약 주소(carrier)로 보내진 외부 체인 트랜잭션의 payload 안에 실려 오는
 * 메시지 묶음 + 서명자별 서명.
 *
 * 와이어 형식:
 *   RLP([ [[typeTag, body], ...], [signature, ...] ])
 *   - typeTag: UTF-8 메시지 타입
 *   - body: 메시지 자체 인코딩 (msg.encode())
 *   - signature: 65 bytes (r ‖ s ‖ recoveryId), keccak256(signBytes)에 대한 서명
 *
 * 서명은 주소가 아니라 위치로 매칭됨 (getRequiredSigners() 순서).
 * 검증 중에만 잠깐 존재하고 저장되지 않음.
 */
export class EmbeddedBatch implements Tx {
  constructor(
    readonly messages: readonly Msg[],
    readonly signatures: readonly Uint8Array[],
  ) {}

  getMsgs(): Msg[] {
    return [...this.messages];
  }

  /**
   * 서명해야 하는 주소 목록
   *
   * 메시지 순서 → 메시지별 서명자 순서로 돌면서 첫 등장만 유지.
   * 예: [A, B] + [B, C] → [A, B, C]
   */
  getRequiredSigners(): Address[] {
    const seen = new Set<Address>();
    const signers: Address[] = [];

    for (const msg of this.messages) {
      for (const signer of msg.getSigners()) {
        const address = normalizeAddress(signer);
        if (!seen.has(address)) {
          seen.add(address);
          signers.push(address);
        }
      }
    }

    return signers;
  }

  /**
   * 서명자 한 명의 서명 문서
   *
   * 키 정렬된 JSON:
   *   {"accountNumber":"<n>","chainId":"<id>","msgs":[<msg sign bytes>...],"sequence":"<n>"}
   *
   * - accountNumber / sequence는 10진 문자열 (64비트 값 보존)
   * - msgs는 각 메시지의 getSignBytes()를 그대로 삽입
   */
  signBytes(chainId: string, accountNumber: number, sequence: number): Uint8Array {
    const msgs = this.messages
      .map((msg) => bytesToUtf8(msg.getSignBytes(), `${msg.type()} sign bytes`))
      .join(',');

    const document =
      `{"accountNumber":${JSON.stringify(accountNumber.toString())}` +
      `,"chainId":${JSON.stringify(chainId)}` +
      `,"msgs":[${msgs}]` +
      `,"sequence":${JSON.stringify(sequence.toString())}}`;

    return utf8ToBytes(document);
  }

  /**
   * 같은 메시지에 서명만 바꾼 새 배치
   */
  withSignatures(signatures: Uint8Array[]): EmbeddedBatch {
    return new EmbeddedBatch(this.messages, signatures);
  }

  encode(): Uint8Array {
    return RLP.encode([
      this.messages.map((msg) => [utf8ToBytes(msg.type()), msg.encode()]),
      [...this.signatures],
    ]);
  }
}
