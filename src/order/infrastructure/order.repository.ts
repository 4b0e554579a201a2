import { Injectable } from '@nestjs/common';
import { QueryFailedError, Repository } from 'typeorm';
import { DatabaseService } from '@common/database/database.service';
import { ErrorCode, RepositoryException } from '@common/exception';
import { Money } from '@common/money/money.vo';
import { IOrderRepository } from '@/order/domain/interfaces/order.repository.interface';
import { Order } from '@/order/domain/entities/order.entity';
import { OrderItem } from '@/order/domain/entities/order-item.entity';
import { OrderStatus } from '@/order/domain/entities/order-status.vo';
import { Address } from '@/order/domain/entities/address.vo';
import { Payment } from '@/order/domain/entities/payment.vo';
import { OrderEntity } from './orm/order.orm-entity';

/**
 * Order Repository Implementation (TypeORM)
 * 현재 트랜잭션의 EntityManager 를 사용한다.
 */
@Injectable()
export class OrderRepository implements IOrderRepository {
  constructor(private readonly database: DatabaseService) {}

  private async orders(): Promise<Repository<OrderEntity>> {
    const manager = await this.database.getManager();
    return manager.getRepository(OrderEntity);
  }

  // ANCHOR save
  async save(order: Order): Promise<number> {
    const repository = await this.orders();
    const entity = repository.create({
      userName: order.userName,
      orderName: order.orderName,
      totalPrice: order.totalPrice.toString(),
      status: order.status.value,
      shippingFirstName: order.shippingAddress.firstName,
      shippingLastName: order.shippingAddress.lastName,
      shippingEmailAddress: order.shippingAddress.emailAddress,
      shippingAddressLine: order.shippingAddress.addressLine,
      shippingCountry: order.shippingAddress.country,
      shippingState: order.shippingAddress.state,
      shippingZipCode: order.shippingAddress.zipCode,
      billingFirstName: order.billingAddress.firstName,
      billingLastName: order.billingAddress.lastName,
      billingEmailAddress: order.billingAddress.emailAddress,
      billingAddressLine: order.billingAddress.addressLine,
      billingCountry: order.billingAddress.country,
      billingState: order.billingAddress.state,
      billingZipCode: order.billingAddress.zipCode,
      cardName: order.payment.cardName,
      cardNumber: order.payment.cardNumber,
      expiration: order.payment.expiration,
      cvv: order.payment.cvv,
      paymentMethod: order.payment.paymentMethod,
      requestId: order.requestId,
      createdAt: order.createdAt,
      items: order.items.map((item) => ({
        productId: item.productId,
        productName: item.productName,
        quantity: item.quantity,
        price: item.price.toString(),
      })),
    });

    try {
      const saved = await repository.save(entity);
      return saved.id;
    } catch (error) {
      const code = driverErrorCode(error);
      if (error instanceof QueryFailedError && code === 'ER_DUP_ENTRY') {
        throw new RepositoryException(ErrorCode.DUPLICATE_ORDER_REQUEST, error);
      }
      // 값이 컬럼 범위를 벗어난 경우: 다시 시도해도 같은 결과
      if (error instanceof QueryFailedError && code !== null && isRejectedData(code)) {
        throw new RepositoryException(ErrorCode.ORDER_DATA_REJECTED, error);
      }
      throw new RepositoryException(
        ErrorCode.PERSISTENCE_FAILED,
        error instanceof Error ? error : undefined,
      );
    }
  }

  // ANCHOR findById
  async findById(id: number): Promise<Order | null> {
    const repository = await this.orders();
    const record = await repository.findOne({
      where: { id },
      relations: { items: true },
    });
    return record ? this.mapToDomain(record) : null;
  }

  // ANCHOR findManyByUserName
  async findManyByUserName(userName: string): Promise<Order[]> {
    const repository = await this.orders();
    const records = await repository.find({
      where: { userName },
      relations: { items: true },
      order: { createdAt: 'DESC', id: 'DESC' },
    });
    return records.map((record) => this.mapToDomain(record));
  }

  // ANCHOR findIdByRequestId
  async findIdByRequestId(requestId: string): Promise<number | null> {
    const repository = await this.orders();
    const record = await repository.findOne({
      select: { id: true },
      where: { requestId },
    });
    return record ? record.id : null;
  }

  /**
   * Helper 도메인 맵퍼
   */
  private mapToDomain(record: OrderEntity): Order {
    return new Order(
      record.id,
      record.userName,
      record.orderName,
      new Address(
        record.shippingFirstName,
        record.shippingLastName,
        record.shippingEmailAddress,
        record.shippingAddressLine,
        record.shippingCountry,
        record.shippingState,
        record.shippingZipCode,
      ),
      new Address(
        record.billingFirstName,
        record.billingLastName,
        record.billingEmailAddress,
        record.billingAddressLine,
        record.billingCountry,
        record.billingState,
        record.billingZipCode,
      ),
      new Payment(
        record.cardName,
        record.cardNumber,
        record.expiration,
        record.cvv,
        record.paymentMethod,
      ),
      OrderStatus.from(record.status),
      [...record.items]
        .sort((a, b) => a.id - b.id)
        .map(
          (item) =>
            new OrderItem(
              item.id,
              record.id,
              item.productId,
              item.productName,
              item.quantity,
              Money.parse(item.price),
            ),
        ),
      record.requestId,
      record.createdAt,
    );
  }
}

function driverErrorCode(error: unknown): string | null {
  if (
    error instanceof QueryFailedError &&
    'code' in error.driverError &&
    typeof error.driverError.code === 'string'
  ) {
    return error.driverError.code;
  }
  return null;
}

const REJECTED_DATA_CODES: readonly string[] = [
  'ER_DATA_TOO_LONG',
  'ER_WARN_DATA_OUT_OF_RANGE',
];

function isRejectedData(code: string): boolean {
  return (
    REJECTED_DATA_CODES.includes(code) ||
    code.startsWith('ER_TRUNCATED_WRONG_VALUE')
  );
}
