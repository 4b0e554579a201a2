import { Injectable } from '@nestjs/common';
import { CheckoutOutboxEntry } from '@/basket/domain/entities/checkout-outbox-entry';
import { ICheckoutOutboxRepository } from '@/basket/domain/interfaces/checkout-outbox.repository.interface';

/**
 * Checkout Outbox Repository Implementation (In-Memory)
 */
@Injectable()
export class CheckoutOutboxMemoryRepository implements ICheckoutOutboxRepository {
  private entries: CheckoutOutboxEntry[] = [];

  // ANCHOR enqueue
  enqueue(entry: CheckoutOutboxEntry): void {
    this.entries.push({ ...entry });
  }

  // ANCHOR findPending
  async findPending(limit: number): Promise<CheckoutOutboxEntry[]> {
    return this.entries.slice(0, limit).map((entry) => ({ ...entry }));
  }

  // ANCHOR markPublished
  async markPublished(entry: CheckoutOutboxEntry): Promise<void> {
    this.entries = this.entries.filter((e) => e.eventId !== entry.eventId);
  }

  size(): number {
    return this.entries.length;
  }
}
