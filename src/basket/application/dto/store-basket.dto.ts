/**
 * 애플리케이션 레이어 DTO: StoreBasket 요청
 */
export interface StoreBasketCommand {
  userName: string;
  items: {
    productId: string;
    productName: string;
    quantity: number;
    price: string;
    color?: string | null;
  }[];
}
