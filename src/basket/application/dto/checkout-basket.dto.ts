import { BasketCheckoutEvent } from '@common/events/basket-checkout.event';

/**
 * 애플리케이션 레이어 DTO: Checkout 요청
 * 금액과 상품 목록은 요청이 아니라 삭제된 장바구니에서 가져온다.
 */
export interface CheckoutBasketCommand {
  userName: string;
  firstName: string;
  lastName: string;
  emailAddress: string;
  addressLine: string;
  country: string;
  state: string;
  zipCode: string;
  cardName: string;
  cardNumber: string;
  expiration: string;
  cvv: string;
  paymentMethod: number;
  requestId?: string | null;
}

// PUBLISHED: 브로커 발행 완료, QUEUED: outbox 적재 완료 (relay 가 발행)
export type CheckoutStatus = 'PUBLISHED' | 'QUEUED';

/**
 * 애플리케이션 레이어 DTO: Checkout 결과
 */
export class CheckoutBasketResult {
  constructor(
    public readonly eventId: string,
    public readonly userName: string,
    public readonly totalPrice: string,
    public readonly status: CheckoutStatus,
  ) {}

  static fromEvent(
    event: BasketCheckoutEvent,
    status: CheckoutStatus,
  ): CheckoutBasketResult {
    return new CheckoutBasketResult(
      event.id,
      event.userName,
      event.totalPrice.toString(),
      status,
    );
  }
}
