import { ErrorCode, DomainException } from '@common/exception';
import { Money } from '@common/money/money.vo';

/**
 * ShoppingCartItem Entity
 * 장바구니 상품 (상품 ID, 수량, 단가, 색상)
 */
export class ShoppingCartItem {
  constructor(
    public readonly productId: string,
    public readonly productName: string,
    public readonly quantity: number,
    public readonly price: Money,
    public readonly color: string | null = null,
  ) {
    this.validateQuantity();
    this.validatePrice();
  }

  get subtotal(): Money {
    return this.price.multiply(this.quantity);
  }

  private validateQuantity(): void {
    if (!Number.isInteger(this.quantity) || this.quantity <= 0) {
      throw new DomainException(ErrorCode.INVALID_QUANTITY);
    }
  }

  private validatePrice(): void {
    if (this.price.isNegative()) {
      throw new DomainException(ErrorCode.INVALID_PRICE);
    }
  }
}
