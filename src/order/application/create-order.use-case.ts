import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import {
  ErrorCode,
  RepositoryException,
  ValidationException,
  toFieldErrors,
} from '@common/exception';
import { ITransactionManager } from '@common/database/transaction-manager';
import { Money } from '@common/money/money.vo';
import { OrderDomainService } from '@/order/domain/services/order.service';
import { Order } from '@/order/domain/entities/order.entity';
import { Address } from '@/order/domain/entities/address.vo';
import { Payment } from '@/order/domain/entities/payment.vo';
import { OrderCreatedEvent } from './events/order-created.event';
import {
  AddressInput,
  CreateOrderCommand,
  CreateOrderResult,
} from './dto/create-order.dto';

/**
 * 주문 생성 파이프라인
 * 주문을 만드는 유일한 경로 (동기 API, 체크아웃 컨슈머 공통)
 *
 * 1. 검증: 실패한 필드를 모두 모아 ValidationException(ORDER_VALIDATION_FAILED)
 * 2. 멱등: requestId 가 있으면 기존 주문을 돌려줌 (duplicate)
 * 3. 저장: 주문 + 주문 상품을 하나의 트랜잭션으로
 * 4. 커밋 후 order.created 발행
 */
@Injectable()
export class CreateOrderUseCase {
  private readonly logger = new Logger(CreateOrderUseCase.name);

  constructor(
    private readonly orderService: OrderDomainService,
    private readonly transactionManager: ITransactionManager,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async execute(input: CreateOrderCommand): Promise<CreateOrderResult> {
    const cmd = await this.validate(input);
    const requestId = cmd.requestId ?? null;
    const order = this.toOrder(cmd, requestId);

    let result: CreateOrderResult;
    try {
      result = await this.transactionManager.runInTransaction(async () => {
        if (requestId !== null) {
          const existingId =
            await this.orderService.findOrderIdByRequestId(requestId);
          if (existingId !== null) {
            return new CreateOrderResult(existingId, true);
          }
        }
        const orderId = await this.orderService.placeOrder(order);
        return new CreateOrderResult(orderId, false);
      });
    } catch (error) {
      result = await this.resolveDuplicate(error, requestId);
    }

    if (result.duplicate) {
      this.logger.log(
        `[Order] 이미 처리된 요청 - requestId: ${requestId}, orderId: ${result.orderId}`,
      );
      return result;
    }

    this.eventEmitter.emit(
      OrderCreatedEvent.EVENT_NAME,
      new OrderCreatedEvent(
        result.orderId,
        order.userName,
        order.shippingAddress.emailAddress,
        order.totalPrice.toString(),
        requestId,
      ),
    );
    this.logger.log(
      `[Order] 주문 생성 - orderId: ${result.orderId}, userName: ${order.userName}, totalPrice: ${order.totalPrice.toString()}`,
    );
    return result;
  }

  private async validate(input: CreateOrderCommand): Promise<CreateOrderCommand> {
    const cmd = plainToInstance(CreateOrderCommand, input);
    const errors = await validate(cmd);
    if (errors.length > 0) {
      throw new ValidationException(
        ErrorCode.ORDER_VALIDATION_FAILED,
        toFieldErrors(errors),
      );
    }
    return cmd;
  }

  // 동시에 들어온 같은 requestId 의 insert 는 유니크 제약으로 실패하므로 다시 읽어 결과를 맞춘다
  private async resolveDuplicate(
    error: unknown,
    requestId: string | null,
  ): Promise<CreateOrderResult> {
    if (
      requestId !== null &&
      error instanceof RepositoryException &&
      error.errorCode === ErrorCode.DUPLICATE_ORDER_REQUEST
    ) {
      const existingId = await this.orderService.findOrderIdByRequestId(requestId);
      if (existingId !== null) {
        return new CreateOrderResult(existingId, true);
      }
    }
    throw error;
  }

  private toOrder(cmd: CreateOrderCommand, requestId: string | null): Order {
    return Order.create({
      userName: cmd.userName,
      orderName: cmd.orderName,
      shippingAddress: toAddress(cmd.shippingAddress),
      billingAddress: toAddress(cmd.billingAddress),
      payment: new Payment(
        cmd.payment.cardName,
        cmd.payment.cardNumber,
        cmd.payment.expiration,
        cmd.payment.cvv,
        cmd.payment.paymentMethod,
      ),
      items: cmd.items.map((item) => ({
        productId: item.productId,
        productName: item.productName,
        quantity: item.quantity,
        price: Money.parse(item.price),
      })),
      requestId,
    });
  }
}

function toAddress(input: AddressInput): Address {
  return new Address(
    input.firstName,
    input.lastName,
    input.emailAddress,
    input.addressLine,
    input.country,
    input.state,
    input.zipCode,
  );
}
