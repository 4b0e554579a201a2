import { ShoppingCart } from '@/basket/domain/entities/shopping-cart.entity';

/**
 * 애플리케이션 레이어 DTO: 장바구니 상품 뷰
 */
export interface BasketItemResult {
  productId: string;
  productName: string;
  quantity: number;
  price: string;
  color: string | null;
}

/**
 * 애플리케이션 레이어 DTO: result -> 뷰
 */
export class GetBasketResult {
  constructor(
    public readonly userName: string,
    public readonly items: BasketItemResult[],
    public readonly totalPrice: string,
  ) {}

  static fromDomain(cart: ShoppingCart): GetBasketResult {
    return new GetBasketResult(
      cart.userName,
      cart.items.map((item) => ({
        productId: item.productId,
        productName: item.productName,
        quantity: item.quantity,
        price: item.price.toString(),
        color: item.color,
      })),
      cart.totalPrice.toString(),
    );
  }
}
