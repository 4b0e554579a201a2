import { Injectable } from '@nestjs/common';
import { ErrorCode, RepositoryException } from '@common/exception';
import { IOrderRepository } from '../domain/interfaces/order.repository.interface';
import { Order } from '../domain/entities/order.entity';
import { OrderItem } from '../domain/entities/order-item.entity';

/**
 * Order Repository Implementation (In-Memory)
 * request_id 유니크 제약을 같은 방식으로 흉내낸다.
 */
@Injectable()
export class OrderMemoryRepository implements IOrderRepository {
  private orders: Map<number, Order> = new Map();
  private currentId = 1;
  private currentItemId = 1;

  // ANCHOR save
  async save(order: Order): Promise<number> {
    if (order.requestId !== null) {
      const existing = await this.findIdByRequestId(order.requestId);
      if (existing !== null) {
        throw new RepositoryException(ErrorCode.DUPLICATE_ORDER_REQUEST);
      }
    }

    const id = this.currentId++;
    const saved = new Order(
      id,
      order.userName,
      order.orderName,
      order.shippingAddress,
      order.billingAddress,
      order.payment,
      order.status,
      order.items.map(
        (item) =>
          new OrderItem(
            this.currentItemId++,
            id,
            item.productId,
            item.productName,
            item.quantity,
            item.price,
          ),
      ),
      order.requestId,
      order.createdAt,
    );
    this.orders.set(id, saved);
    return id;
  }

  // ANCHOR findById
  async findById(id: number): Promise<Order | null> {
    return this.orders.get(id) ?? null;
  }

  // ANCHOR findManyByUserName
  async findManyByUserName(userName: string): Promise<Order[]> {
    return Array.from(this.orders.values())
      .filter((order) => order.userName === userName)
      .sort(
        (a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id,
      );
  }

  // ANCHOR findIdByRequestId
  async findIdByRequestId(requestId: string): Promise<number | null> {
    for (const order of this.orders.values()) {
      if (order.requestId === requestId) {
        return order.id;
      }
    }
    return null;
  }

  count(): number {
    return this.orders.size;
  }
}
