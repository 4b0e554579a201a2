import { Inject, Injectable, Logger } from '@nestjs/common';
import { ApplicationException, ErrorCode } from '@common/exception';
import {
  CHECKOUT_SETTINGS,
  CheckoutSettings,
} from '@common/config/checkout.config';
import {
  BasketCheckoutEvent,
  createBasketCheckoutEvent,
} from '@common/events/basket-checkout.event';
import { serializeBasketCheckoutEvent } from '@common/events/basket-checkout.serializer';
import { ShoppingCart } from '@/basket/domain/entities/shopping-cart.entity';
import { IBasketRepository } from '@/basket/domain/interfaces/basket.repository.interface';
import { BasketCheckoutKafkaProducer } from '@/basket/infrastructure/basket-checkout.kafka.producer';
import {
  CheckoutBasketCommand,
  CheckoutBasketResult,
} from './dto/checkout-basket.dto';

/**
 * 장바구니 체크아웃
 *
 * direct (기본): 장바구니 삭제 → 이벤트 생성 → 발행
 *   삭제 후 발행이 실패하면 체크아웃이 유실될 수 있으므로 error 로그에 복구 정보를 남기고 PublishFailed
 * outbox: 장바구니 삭제와 outbox 적재를 원자적으로 수행, 발행은 CheckoutOutboxRelayScheduler 가 담당
 */
@Injectable()
export class CheckoutBasketUseCase {
  private readonly logger = new Logger(CheckoutBasketUseCase.name);

  constructor(
    private readonly basketRepository: IBasketRepository,
    private readonly producer: BasketCheckoutKafkaProducer,
    @Inject(CHECKOUT_SETTINGS) private readonly settings: CheckoutSettings,
  ) {}

  async execute(cmd: CheckoutBasketCommand): Promise<CheckoutBasketResult> {
    const basket = await this.basketRepository.getBasket(cmd.userName);
    if (!basket) {
      throw new ApplicationException(ErrorCode.BASKET_NOT_FOUND);
    }

    const event = this.buildEvent(basket, cmd);

    return this.settings.publishMode === 'outbox'
      ? this.checkoutWithOutbox(event)
      : this.checkoutDirect(event);
  }

  private async checkoutDirect(
    event: BasketCheckoutEvent,
  ): Promise<CheckoutBasketResult> {
    const deleted = await this.basketRepository.deleteBasket(event.userName);
    if (!deleted) {
      // 다른 요청이 먼저 체크아웃한 경우
      throw new ApplicationException(ErrorCode.BASKET_NOT_FOUND);
    }

    try {
      await this.producer.publish(event);
    } catch (error) {
      this.logger.error(
        `[Checkout] 체크아웃 이벤트 발행 실패 - userName: ${event.userName}, totalPrice: ${event.totalPrice.toString()}, eventId: ${event.id}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new ApplicationException(ErrorCode.CHECKOUT_PUBLISH_FAILED, error);
    }

    this.logger.log(
      `[Checkout] 체크아웃 완료 - userName: ${event.userName}, totalPrice: ${event.totalPrice.toString()}, eventId: ${event.id}`,
    );
    return CheckoutBasketResult.fromEvent(event, 'PUBLISHED');
  }

  private async checkoutWithOutbox(
    event: BasketCheckoutEvent,
  ): Promise<CheckoutBasketResult> {
    const deleted = await this.basketRepository.deleteBasketWithOutbox(
      event.userName,
      {
        eventId: event.id,
        userName: event.userName,
        payload: serializeBasketCheckoutEvent(event).toString('utf8'),
      },
    );
    if (!deleted) {
      throw new ApplicationException(ErrorCode.BASKET_NOT_FOUND);
    }

    this.logger.log(
      `[Checkout] 체크아웃 outbox 적재 - userName: ${event.userName}, totalPrice: ${event.totalPrice.toString()}, eventId: ${event.id}`,
    );
    return CheckoutBasketResult.fromEvent(event, 'QUEUED');
  }

  private buildEvent(
    basket: ShoppingCart,
    cmd: CheckoutBasketCommand,
  ): BasketCheckoutEvent {
    return createBasketCheckoutEvent({
      userName: basket.userName,
      totalPrice: basket.totalPrice,
      firstName: cmd.firstName,
      lastName: cmd.lastName,
      emailAddress: cmd.emailAddress,
      addressLine: cmd.addressLine,
      country: cmd.country,
      state: cmd.state,
      zipCode: cmd.zipCode,
      cardName: cmd.cardName,
      cardNumber: cmd.cardNumber,
      expiration: cmd.expiration,
      cvv: cmd.cvv,
      paymentMethod: cmd.paymentMethod,
      requestId: cmd.requestId ?? null,
      items: basket.items.map((item) => ({
        productId: item.productId,
        productName: item.productName,
        quantity: item.quantity,
        price: item.price,
        color: item.color,
      })),
    });
  }
}
