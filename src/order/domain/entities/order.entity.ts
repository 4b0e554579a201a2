import { ErrorCode, DomainException } from '@common/exception';
import { Money } from '@common/money/money.vo';
import { Address } from './address.vo';
import { OrderItem } from './order-item.entity';
import { OrderStatus } from './order-status.vo';
import { Payment } from './payment.vo';

export interface OrderItemData {
  productId: string;
  productName: string;
  quantity: number;
  price: Money;
}

export interface CreateOrderProps {
  userName: string;
  orderName: string;
  shippingAddress: Address;
  billingAddress: Address;
  payment: Payment;
  items: OrderItemData[];
  requestId: string | null;
}

/**
 * Order Entity (Aggregate Root)
 * 주문 정보와 주문 상품. 합계는 항상 상품 소계의 합으로 계산한다.
 */
export class Order {
  // orders.total_price DECIMAL(10,2) 상한
  static readonly MAX_TOTAL = Money.parse('99999999.99');

  constructor(
    public readonly id: number,
    public readonly userName: string,
    public readonly orderName: string,
    public readonly shippingAddress: Address,
    public readonly billingAddress: Address,
    public readonly payment: Payment,
    public readonly status: OrderStatus,
    public readonly items: readonly OrderItem[],
    public readonly requestId: string | null,
    public readonly createdAt: Date,
  ) {
    this.validateItems();
  }

  /**
   * ANCHOR 신규 주문 생성 (PENDING, 아직 저장되지 않아 id 0)
   */
  static create(props: CreateOrderProps, now: Date = new Date()): Order {
    return new Order(
      0,
      props.userName,
      props.orderName,
      props.shippingAddress,
      props.billingAddress,
      props.payment,
      OrderStatus.PENDING,
      props.items.map(
        (item) =>
          new OrderItem(0, 0, item.productId, item.productName, item.quantity, item.price),
      ),
      props.requestId,
      now,
    );
  }

  get totalPrice(): Money {
    return Money.sum(this.items.map((item) => item.subtotal));
  }

  private validateItems(): void {
    if (this.items.length === 0) {
      throw new DomainException(ErrorCode.INVALID_ORDER_ITEM);
    }
    if (this.items.some((item) => item.orderId !== this.id)) {
      throw new DomainException(ErrorCode.INVALID_ORDER_ITEM);
    }
    if (this.totalPrice.minorUnits > Order.MAX_TOTAL.minorUnits) {
      throw new DomainException(ErrorCode.ORDER_TOTAL_OUT_OF_RANGE);
    }
  }
}
