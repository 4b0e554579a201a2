import { Injectable } from '@nestjs/common';
import Redis from 'ioredis';
import { RedisService } from '@common/redis/redis.service';
import { CheckoutOutboxEntry } from '@/basket/domain/entities/checkout-outbox-entry';
import { ICheckoutOutboxRepository } from '@/basket/domain/interfaces/checkout-outbox.repository.interface';

export const CHECKOUT_OUTBOX_KEY = 'checkout:outbox';

// LREM 은 저장된 문자열과 정확히 일치해야 하므로 항상 같은 필드 순서로 인코딩
export function encodeOutboxEntry(entry: CheckoutOutboxEntry): string {
  return JSON.stringify({
    eventId: entry.eventId,
    userName: entry.userName,
    payload: entry.payload,
  });
}

function decodeOutboxEntry(raw: string): CheckoutOutboxEntry | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  if (
    typeof json === 'object' &&
    json !== null &&
    'eventId' in json &&
    'userName' in json &&
    'payload' in json &&
    typeof json.eventId === 'string' &&
    typeof json.userName === 'string' &&
    typeof json.payload === 'string'
  ) {
    return {
      eventId: json.eventId,
      userName: json.userName,
      payload: json.payload,
    };
  }
  return null;
}

/**
 * Checkout Outbox Repository Implementation (Redis List)
 * RPUSH 로 적재, LRANGE 로 앞에서부터 조회, 발행 완료 시 LREM
 */
@Injectable()
export class CheckoutOutboxRedisRepository implements ICheckoutOutboxRepository {
  constructor(private readonly redisService: RedisService) {}

  private get redis(): Redis {
    return this.redisService.getClient();
  }

  // ANCHOR findPending
  async findPending(limit: number): Promise<CheckoutOutboxEntry[]> {
    if (limit <= 0) {
      return [];
    }
    const raws = await this.redis.lrange(CHECKOUT_OUTBOX_KEY, 0, limit - 1);
    return raws
      .map((raw) => decodeOutboxEntry(raw))
      .filter((entry): entry is CheckoutOutboxEntry => entry !== null);
  }

  // ANCHOR markPublished
  async markPublished(entry: CheckoutOutboxEntry): Promise<void> {
    await this.redis.lrem(CHECKOUT_OUTBOX_KEY, 1, encodeOutboxEntry(entry));
  }
}
