import { Money } from '@common/money/money.vo';
import { ShoppingCartItem } from './shopping-cart-item.entity';

/**
 * ShoppingCart Entity
 * 사용자 이름을 키로 하는 장바구니. 합계는 저장하지 않고 항상 상품 소계의 합으로 계산한다.
 */
export class ShoppingCart {
  constructor(
    public readonly userName: string,
    public readonly items: readonly ShoppingCartItem[] = [],
  ) {}

  get totalPrice(): Money {
    return Money.sum(this.items.map((item) => item.subtotal));
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }
}
