import { Inject, Injectable, Logger } from '@nestjs/common';
import { BrokerChannel } from '@common/kafka/broker-client';
import { BrokerConnectionManager } from '@common/kafka/broker-connection.manager';
import {
  CHECKOUT_SETTINGS,
  CheckoutSettings,
} from '@common/config/checkout.config';
import {
  BASKET_CHECKOUT_EVENT_TYPE,
  BasketCheckoutEvent,
} from '@common/events/basket-checkout.event';
import { serializeBasketCheckoutEvent } from '@common/events/basket-checkout.serializer';

/**
 * Basket Checkout Kafka Producer (Infrastructure Service)
 * - 체크아웃 이벤트를 체크아웃 토픽으로 발행
 * - key: userName (같은 사용자의 체크아웃은 같은 파티션)
 * - headers: event-id, event-type
 */
@Injectable()
export class BasketCheckoutKafkaProducer {
  private readonly logger = new Logger(BasketCheckoutKafkaProducer.name);
  private readonly channel: BrokerChannel;

  constructor(
    connection: BrokerConnectionManager,
    @Inject(CHECKOUT_SETTINGS) private readonly settings: CheckoutSettings,
  ) {
    this.channel = connection.createChannel();
  }

  async publish(event: BasketCheckoutEvent): Promise<void> {
    await this.publishSerialized(
      event.id,
      event.userName,
      serializeBasketCheckoutEvent(event),
    );
  }

  /**
   * 이미 직렬화된 이벤트 발행 (outbox relay)
   */
  async publishSerialized(
    eventId: string,
    userName: string,
    payload: Buffer | string,
  ): Promise<void> {
    await this.channel.publish(this.settings.topic, [
      {
        key: userName,
        value: payload,
        headers: {
          'event-id': eventId,
          'event-type': BASKET_CHECKOUT_EVENT_TYPE,
        },
      },
    ]);

    this.logger.log(
      `[Kafka] 체크아웃 이벤트 발행 완료 - topic: ${this.settings.topic}, eventId: ${eventId}`,
    );
  }
}
