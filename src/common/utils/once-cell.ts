/**
 * OnceCell: 한 번 계산 후 캐시하는 셀
 *
 * 트랜잭션의 hash / size / sender 처럼 파생값이지만 매번 계산하기 비싼 값에 사용.
 * - get(init): 비어 있으면 init() 결과를 저장 후 반환
 * - set(value): 이미 계산된 값을 주입 (디코딩 시 size 등)
 * - reset(): 원본 필드가 바뀌면 무효화 (서명 시)
 *
 * init이 예외를 던지면 셀은 비어 있는 상태로 남음.
 */
export class OnceCell<T> {
  private slot: { value: T } | null = null;

  get(init: () => T): T {
    if (this.slot === null) {
      this.slot = { value: init() };
    }
    return this.slot.value;
  }

  set(value: T): void {
    this.slot = { value };
  }

  peek(): T | undefined {
    return this.slot === null ? undefined : this.slot.value;
  }

  reset(): void {
    this.slot = null;
  }
}
