import { Module } from '@nestjs/common';
import { OrderDomainService } from '@/order/domain/services/order.service';
import { IOrderRepository } from '@/order/domain/interfaces/order.repository.interface';
import { OrderRepository } from '@/order/infrastructure/order.repository';
import { OrderController } from '@/order/presentation/order.controller';

// Use Cases
import { CreateOrderUseCase } from '@/order/application/create-order.use-case';
import { GetOrdersUseCase } from '@/order/application/get-orders.use-case';
import { GetOrderDetailUseCase } from '@/order/application/get-order-detail.use-case';

// Event Listeners
import { OnOrderCreatedListener } from '@/order/application/listeners/on-order-created.listener';

// Kafka Consumers
import { BasketCheckoutKafkaConsumer } from '@/order/presentation/consumers/basket-checkout.kafka.consumer';

/**
 * Order Module
 * 주문 생성 파이프라인과 체크아웃 이벤트 컨슈머
 */
@Module({
  controllers: [OrderController],
  providers: [
    // Order Repository
    {
      provide: IOrderRepository,
      useClass: OrderRepository,
    },

    // Domain Service
    OrderDomainService,

    // Use Cases
    CreateOrderUseCase,
    GetOrdersUseCase,
    GetOrderDetailUseCase,

    // Event Listeners
    OnOrderCreatedListener,

    // Kafka Consumer
    BasketCheckoutKafkaConsumer,
  ],
  exports: [CreateOrderUseCase],
})
export class OrderModule {}
