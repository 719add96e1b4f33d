import { TxContext } from '../../src/context/tx-context';
import { BasicGasMeter, InfiniteGasMeter } from '../../src/gas/gas-meter';

describe('TxContext', () => {
  it('기본 미터는 InfiniteGasMeter여야 함', () => {
    const ctx = new TxContext('2');

    expect(ctx.chainId).toBe('2');
    expect(ctx.gasMeter).toBeInstanceOf(InfiniteGasMeter);
  });

  it('withGasMeter는 새 컨텍스트를 반환하고 원본은 그대로 둬야 함', () => {
    const ctx = new TxContext('9000');
    const meter = new BasicGasMeter(500n);

    const metered = ctx.withGasMeter(meter);

    expect(metered).not.toBe(ctx);
    expect(metered.chainId).toBe('9000');
    expect(metered.gasMeter).toBe(meter);
    expect(ctx.gasMeter).toBeInstanceOf(InfiniteGasMeter);
  });
});
