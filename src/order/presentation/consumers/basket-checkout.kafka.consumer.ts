import { Inject, Injectable, Logger } from '@nestjs/common';
import { EachMessagePayload } from 'kafkajs';
import { KafkaBaseConsumer } from '@common/kafka/kafka.base.consumer';
import { BrokerChannel } from '@common/kafka/broker-client';
import { BrokerConnectionManager } from '@common/kafka/broker-connection.manager';
import { KAFKA_SETTINGS, KafkaSettings } from '@common/kafka/kafka.config';
import {
  CHECKOUT_SETTINGS,
  CheckoutSettings,
} from '@common/config/checkout.config';
import {
  DomainException,
  ErrorCode,
  MessageDeserializationException,
  RepositoryException,
  ValidationException,
} from '@common/exception';
import { Money } from '@common/money/money.vo';
import { errorMessage } from '@common/utils/error-message';
import { BasketCheckoutEvent } from '@common/events/basket-checkout.event';
import { deserializeBasketCheckoutEvent } from '@common/events/basket-checkout.serializer';
import { CreateOrderUseCase } from '@/order/application/create-order.use-case';
import { toCreateOrderCommand } from '@/order/application/mappers/basket-checkout.mapper';

/**
 * basket_checkout_queue
 * - 체크아웃 이벤트 → 주문 생성 커맨드 → 주문 생성 파이프라인
 * - 역직렬화 실패: 로그 후 폐기 (dead-letter 토픽이 설정되어 있으면 원본 바이트를 옮김)
 * - 검증 실패, 도메인 규칙 위반: 이벤트 ID 와 함께 로그로 남기고 폐기
 * - 저장소 장애(PERSISTENCE_FAILED): offset 을 커밋하지 않아 재전달
 * - 저장소가 데이터를 거부(ORDER_DATA_REJECTED): 폐기
 */
@Injectable()
export class BasketCheckoutKafkaConsumer extends KafkaBaseConsumer {
  protected readonly logger = new Logger(BasketCheckoutKafkaConsumer.name);

  readonly topic: string;
  readonly groupId: string;
  private readonly deadLetterChannel: BrokerChannel;

  constructor(
    connection: BrokerConnectionManager,
    @Inject(KAFKA_SETTINGS) kafkaSettings: KafkaSettings,
    @Inject(CHECKOUT_SETTINGS)
    private readonly checkoutSettings: CheckoutSettings,
    private readonly createOrderUseCase: CreateOrderUseCase,
  ) {
    super(connection, kafkaSettings);
    this.topic = checkoutSettings.topic;
    this.groupId = checkoutSettings.consumerGroup;
    this.deadLetterChannel = connection.createChannel();
  }

  async handleMessage(payload: EachMessagePayload): Promise<void> {
    let event: BasketCheckoutEvent;
    try {
      event = deserializeBasketCheckoutEvent(payload.message.value);
    } catch (error) {
      if (!(error instanceof MessageDeserializationException)) {
        throw error;
      }
      this.logger.error(
        `[Kafka] 체크아웃 메시지 역직렬화 실패, 폐기 - partition: ${payload.partition}, offset: ${payload.message.offset}, problems: ${error.problems.join('; ')}`,
      );
      await this.deadLetter(payload, error);
      return;
    }

    this.warnOnTotalMismatch(event);

    const command = toCreateOrderCommand(event, {
      useEventIdAsRequestId: this.checkoutSettings.idempotencyEnabled,
    });

    const ref = `eventId: ${event.id}, requestId: ${event.requestId ?? '-'}`;
    try {
      const result = await this.createOrderUseCase.execute(command);
      this.logger.log(
        `[Order] 체크아웃 주문 처리 완료 - ${ref}, orderId: ${result.orderId}${result.duplicate ? ' (중복)' : ''}`,
      );
    } catch (error) {
      if (error instanceof ValidationException) {
        this.logger.error(
          `[Order] 체크아웃 주문 검증 실패, 폐기 - ${ref}, fields: ${error.fieldErrors.map((e) => e.field).join(', ')}`,
        );
        return;
      }
      if (error instanceof DomainException) {
        this.logger.error(
          `[Order] 체크아웃 주문 규칙 위반, 폐기 - ${ref}, errorCode: ${error.errorCode.code}`,
        );
        return;
      }
      if (error instanceof RepositoryException) {
        if (!this.shouldRedeliver(error)) {
          this.logger.error(
            `[Order] 체크아웃 주문 저장 거부, 폐기 - ${ref}, errorCode: ${error.errorCode.code}: ${error.message}`,
          );
          return;
        }
        this.logger.error(`[Order] 체크아웃 주문 저장 실패 - ${ref}: ${error.message}`);
        throw error;
      }
      this.logger.error(
        `[Order] 체크아웃 주문 처리 실패 - ${ref}: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    }
  }

  // PERSISTENCE_FAILED 만 재전달
  protected shouldRedeliver(error: unknown): boolean {
    return (
      error instanceof RepositoryException &&
      error.errorCode === ErrorCode.PERSISTENCE_FAILED
    );
  }

  private warnOnTotalMismatch(event: BasketCheckoutEvent): void {
    const itemsTotal = Money.sum(
      event.items.map((item) => item.price.multiply(item.quantity)),
    );
    if (!itemsTotal.equals(event.totalPrice)) {
      this.logger.warn(
        `[Order] 체크아웃 합계 불일치 - eventId: ${event.id}, totalPrice: ${event.totalPrice.toString()}, items: ${itemsTotal.toString()}`,
      );
    }
  }

  private async deadLetter(
    payload: EachMessagePayload,
    reason: MessageDeserializationException,
  ): Promise<void> {
    const topic = this.checkoutSettings.deadLetterTopic;
    if (!topic) {
      return;
    }

    try {
      await this.deadLetterChannel.publish(topic, [
        {
          key: payload.message.key,
          value: payload.message.value,
          headers: {
            'x-dead-letter-reason': reason.message,
            'x-original-topic': payload.topic,
            'x-original-offset': payload.message.offset,
          },
        },
      ]);
      this.logger.warn(
        `[Kafka] dead-letter 로 이동 - topic: ${topic}, offset: ${payload.message.offset}`,
      );
    } catch (error) {
      this.logger.error(
        `[Kafka] dead-letter 발행 실패, 메시지 폐기 - offset: ${payload.message.offset}: ${errorMessage(error)}`,
      );
    }
  }
}
