import { ShoppingCart } from '@/basket/domain/entities/shopping-cart.entity';
import { CheckoutOutboxEntry } from '@/basket/domain/entities/checkout-outbox-entry';

/**
 * Basket Repository Port
 * 장바구니 데이터 접근 계약
 */
export abstract class IBasketRepository {
  abstract getBasket(userName: string): Promise<ShoppingCart | null>;
  abstract storeBasket(cart: ShoppingCart): Promise<ShoppingCart>;

  /**
   * @returns 실제로 삭제했으면 true (없었거나 다른 요청이 먼저 삭제했으면 false)
   */
  abstract deleteBasket(userName: string): Promise<boolean>;

  /**
   * 장바구니 삭제와 outbox 적재를 원자적으로 수행
   * 장바구니가 없으면 아무것도 적재하지 않고 false
   */
  abstract deleteBasketWithOutbox(
    userName: string,
    entry: CheckoutOutboxEntry,
  ): Promise<boolean>;
}
