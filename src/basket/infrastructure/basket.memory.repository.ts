import { Injectable } from '@nestjs/common';
import { ShoppingCart } from '@/basket/domain/entities/shopping-cart.entity';
import { CheckoutOutboxEntry } from '@/basket/domain/entities/checkout-outbox-entry';
import { IBasketRepository } from '@/basket/domain/interfaces/basket.repository.interface';
import { CheckoutOutboxMemoryRepository } from './checkout-outbox.memory.repository';

/**
 * Basket Repository Implementation (In-Memory)
 */
@Injectable()
export class BasketMemoryRepository implements IBasketRepository {
  private baskets: Map<string, ShoppingCart> = new Map();

  constructor(private readonly outbox: CheckoutOutboxMemoryRepository) {}

  // ANCHOR getBasket
  async getBasket(userName: string): Promise<ShoppingCart | null> {
    return this.baskets.get(userName) ?? null;
  }

  // ANCHOR storeBasket
  async storeBasket(cart: ShoppingCart): Promise<ShoppingCart> {
    this.baskets.set(cart.userName, cart);
    return cart;
  }

  // ANCHOR deleteBasket
  async deleteBasket(userName: string): Promise<boolean> {
    return this.baskets.delete(userName);
  }

  // ANCHOR deleteBasketWithOutbox
  async deleteBasketWithOutbox(
    userName: string,
    entry: CheckoutOutboxEntry,
  ): Promise<boolean> {
    if (!this.baskets.delete(userName)) {
      return false;
    }
    this.outbox.enqueue(entry);
    return true;
  }
}
