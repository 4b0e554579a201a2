import { CheckoutSettings } from '@common/config/checkout.config';
import { KafkaSettings } from '@common/kafka/kafka.config';
import { Money } from '@common/money/money.vo';
import {
  BasketCheckoutEvent,
  BasketCheckoutEventInput,
  createBasketCheckoutEvent,
} from '@common/events/basket-checkout.event';
import { CheckoutBasketCommand } from '@/basket/application/dto/checkout-basket.dto';
import { ShoppingCart } from '@/basket/domain/entities/shopping-cart.entity';
import { ShoppingCartItem } from '@/basket/domain/entities/shopping-cart-item.entity';

export const TEST_TOPIC = 'basket_checkout_queue';

export function testKafkaSettings(
  overrides: Partial<KafkaSettings> = {},
): KafkaSettings {
  return {
    clientId: 'test-client',
    brokers: ['localhost:9094'],
    connectRetries: 0,
    shutdownTimeoutMs: 200,
    resubscribeDelayMs: 10,
    fromBeginning: true,
    ...overrides,
  };
}

export function testCheckoutSettings(
  overrides: Partial<CheckoutSettings> = {},
): CheckoutSettings {
  return {
    topic: TEST_TOPIC,
    consumerGroup: 'test-ordering',
    publishMode: 'direct',
    deadLetterTopic: null,
    idempotencyEnabled: false,
    outboxBatchSize: 100,
    ...overrides,
  };
}

export function swnBasket(): ShoppingCart {
  return new ShoppingCart('swn', [
    new ShoppingCartItem('p-1', 'Test Product', 2, Money.parse('25.00'), 'Red'),
  ]);
}

export function checkoutCommand(
  overrides: Partial<CheckoutBasketCommand> = {},
): CheckoutBasketCommand {
  return {
    userName: 'swn',
    firstName: 'Jane',
    lastName: 'Doe',
    emailAddress: 'test@example.com',
    addressLine: '1 Main St',
    country: 'KR',
    state: 'Seoul',
    zipCode: '04524',
    cardName: 'Test Card',
    cardNumber: '0000000000000000',
    expiration: '12/30',
    cvv: '000',
    paymentMethod: 1,
    ...overrides,
  };
}

export function checkoutEvent(
  overrides: Partial<BasketCheckoutEventInput> = {},
): BasketCheckoutEvent {
  return createBasketCheckoutEvent(
    {
      userName: 'swn',
      totalPrice: Money.parse('50.00'),
      firstName: 'Jane',
      lastName: 'Doe',
      emailAddress: 'test@example.com',
      addressLine: '1 Main St',
      country: 'KR',
      state: 'Seoul',
      zipCode: '04524',
      cardName: 'Test Card',
      cardNumber: '0000000000000000',
      expiration: '12/30',
      cvv: '000',
      paymentMethod: 1,
      items: [
        {
          productId: 'p-1',
          productName: 'Test Product',
          quantity: 2,
          price: Money.parse('25.00'),
          color: 'Red',
        },
      ],
      ...overrides,
    },
    new Date('2024-01-01T00:00:00.000Z'),
  );
}
