/**
 * 주문 생성 완료 이벤트 (프로세스 내부)
 *
 * 이벤트명: order.created
 * 발행: CreateOrderUseCase (트랜잭션 커밋 후, 중복 요청은 발행하지 않음)
 * 구독: OnOrderCreatedListener (주문 접수 알림)
 */
export class OrderCreatedEvent {
  static readonly EVENT_NAME = 'order.created';

  constructor(
    public readonly orderId: number,
    public readonly userName: string,
    public readonly emailAddress: string,
    public readonly totalPrice: string,
    public readonly requestId: string | null,
  ) {}
}
