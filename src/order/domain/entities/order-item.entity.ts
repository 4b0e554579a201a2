import { ErrorCode, DomainException } from '@common/exception';
import { Money } from '@common/money/money.vo';

/**
 * OrderItem Entity
 * 주문 상품 상세 (항상 하나의 주문에 속함)
 */
export class OrderItem {
  constructor(
    public readonly id: number,
    public readonly orderId: number,
    public readonly productId: string,
    public readonly productName: string,
    public readonly quantity: number,
    public readonly price: Money,
  ) {
    this.validatePrice();
    this.validateQuantity();
  }

  get subtotal(): Money {
    return this.price.multiply(this.quantity);
  }

  private validatePrice(): void {
    if (this.price.isNegative()) {
      throw new DomainException(ErrorCode.INVALID_PRICE);
    }
  }

  private validateQuantity(): void {
    if (!Number.isInteger(this.quantity) || this.quantity <= 0) {
      throw new DomainException(ErrorCode.INVALID_QUANTITY);
    }
  }
}
