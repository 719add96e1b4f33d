import { plainToInstance } from 'class-transformer';
import { IsOptional, Matches, validateSync } from 'class-validator';
import {
  DEFAULT_CARRIER_ADDRESS,
  DEFAULT_CHAIN_ID,
  DEFAULT_GAS_CONFIG,
} from '../constants/bridge.constants';
import { Address, normalizeAddress } from '../types/common.types';

/**
 * 가스 스케줄
 */
export interface GasConfig {
  txSizeCostPerByte: bigint;
  sigVerifyCost: bigint;
  readCostFlat: bigint;
  writeCostFlat: bigint;
}

/**
 * BridgeConfig
 *
 * 시작 시 한 번 읽고 동결. 이후 읽기 전용.
 * carrierAddress는 전역 변수가 아니라 이 설정을 통해 AnteHandler 생성자로 주입됨.
 */
export interface BridgeConfig {
  chainId: string;
  carrierAddress: Address;
  accountDbPath: string | null;
  port: number;
  gas: Readonly<GasConfig>;
}

export const BRIDGE_CONFIG = 'BRIDGE_CONFIG';

const UINT_PATTERN = /^\d+$/;

/**
 * 환경 변수 형식 (class-validator)
 */
class BridgeEnvironment {
  @IsOptional()
  @Matches(/^-?\d+$/, { message: 'CHAIN_ID must be a decimal integer' })
  CHAIN_ID?: string;

  @IsOptional()
  @Matches(/^0x[a-fA-F0-9]{40}$/, {
    message: 'CARRIER_ADDRESS must be a valid address (0x + 40 hex characters)',
  })
  CARRIER_ADDRESS?: string;

  @IsOptional()
  ACCOUNT_DB_PATH?: string;

  @IsOptional()
  @Matches(UINT_PATTERN, { message: 'PORT must be a non-negative integer' })
  PORT?: string;

  @IsOptional()
  @Matches(UINT_PATTERN, {
    message: 'GAS_TX_SIZE_COST_PER_BYTE must be a non-negative integer',
  })
  GAS_TX_SIZE_COST_PER_BYTE?: string;

  @IsOptional()
  @Matches(UINT_PATTERN, {
    message: 'GAS_SIG_VERIFY_COST must be a non-negative integer',
  })
  GAS_SIG_VERIFY_COST?: string;

  @IsOptional()
  @Matches(UINT_PATTERN, {
    message: 'GAS_READ_COST_FLAT must be a non-negative integer',
  })
  GAS_READ_COST_FLAT?: string;

  @IsOptional()
  @Matches(UINT_PATTERN, {
    message: 'GAS_WRITE_COST_FLAT must be a non-negative integer',
  })
  GAS_WRITE_COST_FLAT?: string;
}

/**
 * 환경 변수 → BridgeConfig
 *
 * 빈 문자열은 설정하지 않은 것으로 취급.
 *
 * @throws {Error} 형식이 잘못된 변수가 있으면 (변수 이름 포함)
 */
export function loadBridgeConfig(
  env: Record<string, string | undefined> = process.env,
): Readonly<BridgeConfig> {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      present[key] = value;
    }
  }

  const parsed = plainToInstance(BridgeEnvironment, present);
  const errors = validateSync(parsed, { skipMissingProperties: true });
  if (errors.length > 0) {
    const details = errors
      .flatMap((error) => Object.values(error.constraints ?? {}))
      .join('; ');
    throw new Error(`Invalid bridge configuration: ${details}`);
  }

  const gas: GasConfig = {
    txSizeCostPerByte: uintOr(
      parsed.GAS_TX_SIZE_COST_PER_BYTE,
      DEFAULT_GAS_CONFIG.txSizeCostPerByte,
    ),
    sigVerifyCost: uintOr(
      parsed.GAS_SIG_VERIFY_COST,
      DEFAULT_GAS_CONFIG.sigVerifyCost,
    ),
    readCostFlat: uintOr(
      parsed.GAS_READ_COST_FLAT,
      DEFAULT_GAS_CONFIG.readCostFlat,
    ),
    writeCostFlat: uintOr(
      parsed.GAS_WRITE_COST_FLAT,
      DEFAULT_GAS_CONFIG.writeCostFlat,
    ),
  };

  return Object.freeze({
    chainId: parsed.CHAIN_ID ?? DEFAULT_CHAIN_ID,
    carrierAddress: normalizeAddress(
      parsed.CARRIER_ADDRESS ?? DEFAULT_CARRIER_ADDRESS,
    ),
    accountDbPath: parsed.ACCOUNT_DB_PATH ?? null,
    port: parsed.PORT === undefined ? 3000 : Number(parsed.PORT),
    gas: Object.freeze(gas),
  });
}

function uintOr(value: string | undefined, fallback: bigint): bigint {
  return value === undefined ? fallback : BigInt(value);
}
