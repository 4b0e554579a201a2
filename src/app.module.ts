import { DynamicModule, Module, Type } from '@nestjs/common';
import { EventEmitterModule } from '@nestjs/event-emitter';

// GLOBAL MODULES
import { GlobalConfigModule } from './@common/config/config.module';
import { GlobalKafkaModule } from './@common/kafka/kafka.module';
import { GlobalRedisModule } from './@common/redis/redis.module';
import { GlobalDatabaseModule } from './@common/database/database.module';
import { AppRole } from './@common/config/app-role';

// APP MODULES
import { BasketModule } from './basket/basket.module';
import { OrderModule } from './order/order.module';
import { SchedulerModule } from './@schedulers/scheduler.module';

const BASKET_MODULES: Type[] = [GlobalRedisModule, BasketModule, SchedulerModule];
const ORDER_MODULES: Type[] = [GlobalDatabaseModule, OrderModule];

/**
 * APP_ROLE 에 따라 장바구니/주문 컨텍스트를 함께 또는 따로 띄운다.
 * 브로커 연결은 한 프로세스 안의 모든 Producer/Consumer 가 공유한다.
 */
@Module({})
export class AppModule {
  static forRole(role: AppRole): DynamicModule {
    return {
      module: AppModule,
      imports: [
        // GLOBAL
        GlobalConfigModule,
        GlobalKafkaModule,
        EventEmitterModule.forRoot(),

        // APP MODULES
        ...(role === 'order' ? [] : BASKET_MODULES),
        ...(role === 'basket' ? [] : ORDER_MODULES),
      ],
    };
  }
}
