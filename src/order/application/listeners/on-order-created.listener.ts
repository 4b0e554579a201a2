import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { OrderCreatedEvent } from '../events/order-created.event';

/**
 * onOrderCreated - 주문 접수 알림
 *
 * 수신: order.created
 * 동작: 주문자에게 접수 알림 (메일 발송 대신 로그)
 */
@Injectable()
export class OnOrderCreatedListener {
  private readonly logger = new Logger('order:' + OnOrderCreatedListener.name);

  @OnEvent(OrderCreatedEvent.EVENT_NAME)
  handle(event: OrderCreatedEvent): void {
    this.logger.log(
      `[onOrderCreated] 주문 접수 알림 - orderId: ${event.orderId}, to: ${event.emailAddress}, totalPrice: ${event.totalPrice}`,
    );
  }
}
