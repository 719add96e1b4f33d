import { bigIntToBytes, bytesToBigInt, setLengthLeft } from '@ethereumjs/util';
import { Test, TestingModule } from '@nestjs/testing';
import { SECP256K1_N } from '../../../src/common/constants/bridge.constants';
import { CryptoService } from '../../../src/common/crypto/crypto.service';
import { SignatureInvalidError } from '../../../src/common/errors/bridge.errors';

/**
 * CryptoService 테스트
 *
 * 테스트 범위:
 * 1. 해시 (keccak256, hashBuffer)
 * 2. 키 생성 / 주소 파생
 * 3. 서명 (signHash, signTransaction, signCompact, encodeV)
 * 4. 컴팩트 서명 변환 (toCompactSignature)
 * 5. 복구 (recoverPublicKey, recoverAddress) + 검증 규칙
 * 6. RLP / HEX 유틸리티
 */
describe('CryptoService', () => {
  let service: CryptoService;

  // 개인키 1 → 생성점 G
  const KEY_ONE = '0x' + '0'.repeat(63) + '1';
  const KEY_ONE_ADDRESS = '0x7e5f4552091a69125d5dfcb7b8c2659029395bdf';

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [CryptoService],
    }).compile();

    service = module.get<CryptoService>(CryptoService);
  });

  describe('Hash Functions', () => {
    it('keccak256("hello")를 계산해야 함', () => {
      expect(service.hashBuffer(Buffer.from('hello', 'utf8'))).toBe(
        '0x1c8aff950685c2ed4bc3174f3472287b56d9517b9c948127319a09a7a36deac8',
      );
    });

    it('빈 입력의 해시를 계산해야 함', () => {
      expect(service.hashBuffer(new Uint8Array(0))).toBe(
        '0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470',
      );
    });

    it('keccak256은 32바이트를 반환해야 함', () => {
      const digest = service.keccak256(Uint8Array.from([1, 2, 3]));

      expect(digest).toHaveLength(32);
      expect(service.bytesToHex(digest)).toBe(
        service.hashBuffer(Uint8Array.from([1, 2, 3])),
      );
    });
  });

  describe('Keys and Addresses', () => {
    it('개인키 1의 공개키는 생성점이어야 함', () => {
      expect(service.getPublicKeyFromPrivate(KEY_ONE)).toBe(
        '79be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798' +
          '483ada7726a3c4655da4fbfc0e1108a8fd17b448a68554199c47d08ffb10d4b8',
      );
    });

    it('개인키로부터 주소를 파생해야 함', () => {
      expect(service.privateKeyToAddress(KEY_ONE)).toBe(KEY_ONE_ADDRESS);
    });

    it('잘못된 개인키는 거부해야 함', () => {
      expect(() => service.getPublicKeyFromPrivate('0x1234')).toThrow(
        'Invalid private key',
      );
      expect(() => service.getPublicKeyFromPrivate('0x' + '0'.repeat(64))).toThrow(
        'Invalid private key',
      );
    });

    it('생성한 키 쌍은 서로 일치해야 함', () => {
      const keyPair = service.generateKeyPair();

      expect(keyPair.privateKey).toMatch(/^0x[0-9a-f]{64}$/);
      expect(keyPair.publicKey).toMatch(/^[0-9a-f]{128}$/);
      expect(keyPair.address).toMatch(/^0x[0-9a-f]{40}$/);
      expect(service.privateKeyToAddress(keyPair.privateKey)).toBe(
        keyPair.address,
      );
    });
  });

  describe('Signing', () => {
    const hash = new Uint8Array(32).fill(7);

    it('signHash는 low-s 서명을 만들어야 함', () => {
      const { r, s, recoveryId } = service.signHash(hash, KEY_ONE);

      expect(r > 0n && r < SECP256K1_N).toBe(true);
      expect(s <= SECP256K1_N / 2n).toBe(true);
      expect([0, 1]).toContain(recoveryId);
    });

    it('같은 입력이면 같은 서명이어야 함 (RFC 6979)', () => {
      expect(service.signHash(hash, KEY_ONE)).toEqual(
        service.signHash(hash, KEY_ONE),
      );
    });

    it('32바이트가 아닌 해시는 거부해야 함', () => {
      expect(() => service.signHash(new Uint8Array(31), KEY_ONE)).toThrow(
        'Invalid message hash (must be 32 bytes)',
      );
    });

    it('encodeV는 레거시와 EIP-155를 구분해야 함', () => {
      expect(service.encodeV(0, 0n)).toBe(27n);
      expect(service.encodeV(1, 0n)).toBe(28n);
      expect(service.encodeV(0, 2n)).toBe(39n);
      expect(service.encodeV(1, 2n)).toBe(40n);
    });

    it('signTransaction은 v에 체인 ID를 인코딩해야 함', () => {
      const { recoveryId } = service.signHash(hash, KEY_ONE);

      const signature = service.signTransaction(hash, KEY_ONE, 5n);

      expect(signature.v).toBe(BigInt(recoveryId) + 45n);
    });

    it('signCompact는 r ‖ s ‖ recoveryId 65바이트여야 함', () => {
      const { r, s, recoveryId } = service.signHash(hash, KEY_ONE);

      const compact = service.signCompact(hash, KEY_ONE);

      expect(compact).toHaveLength(65);
      expect(bytesToBigInt(compact.subarray(0, 32))).toBe(r);
      expect(bytesToBigInt(compact.subarray(32, 64))).toBe(s);
      expect(compact[64]).toBe(recoveryId);
    });
  });

  describe('toCompactSignature', () => {
    const hash = new Uint8Array(32).fill(9);

    it('v 인코딩을 풀어 recoveryId를 기록해야 함', () => {
      const signature = service.signTransaction(hash, KEY_ONE, 2n);

      const compact = service.toCompactSignature(signature, 2n);

      expect(compact[64]).toBe(Number(signature.v - 39n));
      expect(service.recoverAddress(hash, compact, true)).toBe(KEY_ONE_ADDRESS);
    });

    it('v가 체인 ID와 맞지 않으면 거부해야 함', () => {
      expect(() =>
        service.toCompactSignature({ v: 27n, r: 1n, s: 1n }, 2n),
      ).toThrow(
        new SignatureInvalidError('invalid signature: v=27 does not match chain id 2'),
      );
    });

    it('32바이트를 넘는 r은 거부해야 함', () => {
      expect(() =>
        service.toCompactSignature({ v: 27n, r: 2n ** 256n, s: 1n }, 0n),
      ).toThrow('invalid signature: value exceeds 32 bytes');
    });
  });

  describe('Recovery', () => {
    const hash = new Uint8Array(32).fill(3);

    it('컴팩트 서명으로 주소를 복구해야 함', () => {
      const compact = service.signCompact(hash, KEY_ONE);

      expect(service.recoverAddress(hash, compact)).toBe(KEY_ONE_ADDRESS);
    });

    it('해시 길이가 틀리면 거부해야 함', () => {
      const compact = service.signCompact(hash, KEY_ONE);

      expect(() => service.recoverPublicKey(new Uint8Array(20), compact)).toThrow(
        'invalid message hash length',
      );
    });

    it('recoveryId가 0/1이 아니면 거부해야 함', () => {
      const compact = service.signCompact(hash, KEY_ONE);
      compact[64] = 2;

      expect(() => service.recoverPublicKey(hash, compact)).toThrow(
        'invalid recovery id: 2',
      );
    });

    it('r이나 s가 범위를 벗어나면 거부해야 함', () => {
      const zero = new Uint8Array(65);
      const overflow = service.signCompact(hash, KEY_ONE);
      overflow.set(setLengthLeft(bigIntToBytes(SECP256K1_N), 32), 0);

      expect(() => service.recoverPublicKey(hash, zero)).toThrow(
        'invalid signature values',
      );
      expect(() => service.recoverPublicKey(hash, overflow)).toThrow(
        'invalid signature values',
      );
    });

    it('high-s는 requireLowS일 때만 거부해야 함', () => {
      const compact = service.signCompact(hash, KEY_ONE);
      const s = bytesToBigInt(compact.subarray(32, 64));
      const highS = Uint8Array.from(compact);
      highS.set(setLengthLeft(bigIntToBytes(SECP256K1_N - s), 32), 32);
      highS[64] = compact[64] ^ 1;

      expect(() => service.recoverAddress(hash, highS, true)).toThrow(
        'invalid signature: s is not in lower half',
      );
      expect(service.recoverAddress(hash, highS)).toBe(KEY_ONE_ADDRESS);
    });

    it('모든 복구 실패는 SignatureInvalidError여야 함', () => {
      expect(() => service.recoverPublicKey(hash, new Uint8Array(10))).toThrow(
        SignatureInvalidError,
      );
    });
  });

  describe('RLP and HEX', () => {
    it('RLP 인코딩/디코딩', () => {
      const encoded = service.rlpEncode(['dog', Uint8Array.from([])]);

      expect(Array.from(encoded)).toEqual([0xc5, 0x83, 0x64, 0x6f, 0x67, 0x80]);
      expect(service.rlpDecode(encoded)).toEqual([
        Uint8Array.from([0x64, 0x6f, 0x67]),
        Uint8Array.from([]),
      ]);
    });

    it('남는 바이트가 있으면 RLP 디코딩 에러', () => {
      expect(() => service.rlpDecode(Uint8Array.from([0x80, 0x80]))).toThrow();
    });

    it('HEX 변환은 0x 접두사 유무와 무관해야 함', () => {
      expect(Array.from(service.hexToBytes('0x0aff'))).toEqual([0x0a, 0xff]);
      expect(Array.from(service.hexToBytes('0aff'))).toEqual([0x0a, 0xff]);
      expect(service.bytesToHex(Uint8Array.from([0x0a, 0xff]))).toBe('0x0aff');
      expect(service.bytesToHex(new Uint8Array(0))).toBe('0x');
    });
  });
});
