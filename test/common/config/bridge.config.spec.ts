import { loadBridgeConfig } from '../../../src/common/config/bridge.config';

/**
 * loadBridgeConfig 테스트
 *
 * 테스트 범위:
 * - 기본값
 * - 환경 변수 덮어쓰기 / 정규화
 * - 빈 문자열은 미설정
 * - 형식 오류 메시지
 */
describe('loadBridgeConfig', () => {
  it('환경 변수가 없으면 기본값을 사용해야 함', () => {
    expect(loadBridgeConfig({})).toEqual({
      chainId: '2',
      carrierAddress: '0x0000000000000000000000000000000000000100',
      accountDbPath: null,
      port: 3000,
      gas: {
        txSizeCostPerByte: 1n,
        sigVerifyCost: 100n,
        readCostFlat: 10n,
        writeCostFlat: 10n,
      },
    });
  });

  it('설정은 동결되어 있어야 함', () => {
    const config = loadBridgeConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.gas)).toBe(true);
  });

  it('환경 변수로 덮어써야 함', () => {
    const config = loadBridgeConfig({
      CHAIN_ID: '9000',
      CARRIER_ADDRESS: '0x' + 'AB'.repeat(20),
      ACCOUNT_DB_PATH: './data/test-accounts',
      PORT: '8080',
      GAS_TX_SIZE_COST_PER_BYTE: '3',
      GAS_SIG_VERIFY_COST: '250',
      GAS_READ_COST_FLAT: '0',
      GAS_WRITE_COST_FLAT: '7',
    });

    expect(config).toEqual({
      chainId: '9000',
      carrierAddress: '0x' + 'ab'.repeat(20),
      accountDbPath: './data/test-accounts',
      port: 8080,
      gas: {
        txSizeCostPerByte: 3n,
        sigVerifyCost: 250n,
        readCostFlat: 0n,
        writeCostFlat: 7n,
      },
    });
  });

  it('빈 문자열은 설정하지 않은 것으로 취급해야 함', () => {
    const config = loadBridgeConfig({ CHAIN_ID: '', ACCOUNT_DB_PATH: '' });

    expect(config.chainId).toBe('2');
    expect(config.accountDbPath).toBeNull();
  });

  it('관련 없는 환경 변수는 무시해야 함', () => {
    expect(() => loadBridgeConfig({ HOME: '/root', NODE_ENV: 'test' })).not.toThrow();
  });

  it('형식이 잘못된 변수는 이름과 함께 거부해야 함', () => {
    expect(() => loadBridgeConfig({ CHAIN_ID: 'abc' })).toThrow(
      'Invalid bridge configuration: CHAIN_ID must be a decimal integer',
    );
    expect(() => loadBridgeConfig({ CARRIER_ADDRESS: '0x12' })).toThrow(
      'Invalid bridge configuration: CARRIER_ADDRESS must be a valid address (0x + 40 hex characters)',
    );
    expect(() => loadBridgeConfig({ PORT: '-1' })).toThrow(
      'Invalid bridge configuration: PORT must be a non-negative integer',
    );
  });

  it('여러 변수가 잘못되면 모두 보고해야 함', () => {
    expect(() =>
      loadBridgeConfig({ PORT: 'x', GAS_SIG_VERIFY_COST: '1.5' }),
    ).toThrow(
      'Invalid bridge configuration: PORT must be a non-negative integer; GAS_SIG_VERIFY_COST must be a non-negative integer',
    );
  });
});
