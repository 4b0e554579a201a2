import { Module } from '@nestjs/common';
import { IBasketRepository } from '@/basket/domain/interfaces/basket.repository.interface';
import { ICheckoutOutboxRepository } from '@/basket/domain/interfaces/checkout-outbox.repository.interface';
import { BasketRedisRepository } from '@/basket/infrastructure/basket.redis.repository';
import { CheckoutOutboxRedisRepository } from '@/basket/infrastructure/checkout-outbox.redis.repository';
import { BasketCheckoutKafkaProducer } from '@/basket/infrastructure/basket-checkout.kafka.producer';
import { GetBasketUseCase } from '@/basket/application/get-basket.use-case';
import { StoreBasketUseCase } from '@/basket/application/store-basket.use-case';
import { DeleteBasketUseCase } from '@/basket/application/delete-basket.use-case';
import { CheckoutBasketUseCase } from '@/basket/application/checkout-basket.use-case';
import { BasketController } from '@/basket/presentation/basket.controller';

/**
 * Basket Module
 * 장바구니 저장소와 체크아웃 발행
 */
@Module({
  controllers: [BasketController],
  providers: [
    // Repository
    {
      provide: IBasketRepository,
      useClass: BasketRedisRepository,
    },
    {
      provide: ICheckoutOutboxRepository,
      useClass: CheckoutOutboxRedisRepository,
    },

    // Infrastructure
    BasketCheckoutKafkaProducer,

    // UseCase
    GetBasketUseCase,
    StoreBasketUseCase,
    DeleteBasketUseCase,
    CheckoutBasketUseCase,
  ],
  exports: [ICheckoutOutboxRepository, BasketCheckoutKafkaProducer],
})
export class BasketModule {}
