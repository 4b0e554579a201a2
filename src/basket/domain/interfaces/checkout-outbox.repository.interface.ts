import { CheckoutOutboxEntry } from '@/basket/domain/entities/checkout-outbox-entry';

/**
 * Checkout Outbox Repository Port
 * 적재 순서대로 조회한다.
 */
export abstract class ICheckoutOutboxRepository {
  abstract findPending(limit: number): Promise<CheckoutOutboxEntry[]>;
  abstract markPublished(entry: CheckoutOutboxEntry): Promise<void>;
}
