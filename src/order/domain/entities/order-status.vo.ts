import { ErrorCode, DomainException } from '@common/exception';

/**
 * OrderStatus Value Object
 * 생성된 주문은 PENDING 이며 상태 전이는 아직 없다.
 */
export class OrderStatus {
  private constructor(public readonly value: string) {}

  static readonly PENDING = new OrderStatus('PENDING');

  static from(value: string): OrderStatus {
    if (value.toUpperCase() === OrderStatus.PENDING.value) {
      return OrderStatus.PENDING;
    }
    throw new DomainException(ErrorCode.INVALID_ORDER_STATUS);
  }
}
