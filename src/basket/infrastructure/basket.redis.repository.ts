import { Injectable } from '@nestjs/common';
import Redis from 'ioredis';
import { readString } from '@common/config/env';
import { RedisService } from '@common/redis/redis.service';
import { ShoppingCart } from '@/basket/domain/entities/shopping-cart.entity';
import { CheckoutOutboxEntry } from '@/basket/domain/entities/checkout-outbox-entry';
import { IBasketRepository } from '@/basket/domain/interfaces/basket.repository.interface';
import { decodeBasket, encodeBasket } from './basket.document';
import {
  CHECKOUT_OUTBOX_KEY,
  encodeOutboxEntry,
} from './checkout-outbox.redis.repository';

// KEYS[1]: 장바구니 키, KEYS[2]: outbox 리스트, ARGV[1]: outbox 항목
const DELETE_WITH_OUTBOX_SCRIPT = `
if redis.call('DEL', KEYS[1]) == 1 then
  redis.call('RPUSH', KEYS[2], ARGV[1])
  return 1
end
return 0
`;

/**
 * Basket Repository Implementation (Redis)
 * basket:{userName} 키에 JSON 문서로 저장
 */
@Injectable()
export class BasketRedisRepository implements IBasketRepository {
  private readonly keyPrefix = readString(process.env, 'BASKET_KEY_PREFIX', 'basket:');

  constructor(private readonly redisService: RedisService) {}

  private get redis(): Redis {
    return this.redisService.getClient();
  }

  private key(userName: string): string {
    return `${this.keyPrefix}${userName}`;
  }

  // ANCHOR getBasket
  async getBasket(userName: string): Promise<ShoppingCart | null> {
    const raw = await this.redis.get(this.key(userName));
    return raw ? decodeBasket(raw) : null;
  }

  // ANCHOR storeBasket
  async storeBasket(cart: ShoppingCart): Promise<ShoppingCart> {
    await this.redis.set(this.key(cart.userName), encodeBasket(cart));
    return cart;
  }

  // ANCHOR deleteBasket
  async deleteBasket(userName: string): Promise<boolean> {
    const removed = await this.redis.del(this.key(userName));
    return removed === 1;
  }

  // ANCHOR deleteBasketWithOutbox
  async deleteBasketWithOutbox(
    userName: string,
    entry: CheckoutOutboxEntry,
  ): Promise<boolean> {
    const result = await this.redis.eval(
      DELETE_WITH_OUTBOX_SCRIPT,
      2,
      this.key(userName),
      CHECKOUT_OUTBOX_KEY,
      encodeOutboxEntry(entry),
    );
    return result === 1;
  }
}
