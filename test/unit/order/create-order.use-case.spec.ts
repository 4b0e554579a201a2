import { EventEmitter2 } from '@nestjs/event-emitter';
import { CreateOrderUseCase } from '@/order/application/create-order.use-case';
import { GetOrdersUseCase } from '@/order/application/get-orders.use-case';
import { CreateOrderCommand } from '@/order/application/dto/create-order.dto';
import { OrderCreatedEvent } from '@/order/application/events/order-created.event';
import { toCreateOrderCommand } from '@/order/application/mappers/basket-checkout.mapper';
import { OrderDomainService } from '@/order/domain/services/order.service';
import { OrderMemoryRepository } from '@/order/infrastructure/order.memory.repository';
import { MemoryTransactionManager } from '@common/database/memory-transaction.manager';
import {
  ErrorCode,
  RepositoryException,
  ValidationException,
} from '@common/exception';
import { checkoutEvent } from '../../helpers/fixtures';

function orderCommand(requestId: string | null = null): CreateOrderCommand {
  const command = toCreateOrderCommand(checkoutEvent(), {
    useEventIdAsRequestId: false,
  });
  command.requestId = requestId;
  return command;
}

describe('CreateOrderUseCase', () => {
  let orderRepository: OrderMemoryRepository;
  let orderService: OrderDomainService;
  let eventEmitter: EventEmitter2;
  let emitted: OrderCreatedEvent[];
  let useCase: CreateOrderUseCase;

  beforeEach(() => {
    orderRepository = new OrderMemoryRepository();
    orderService = new OrderDomainService(orderRepository);
    eventEmitter = new EventEmitter2();
    emitted = [];
    eventEmitter.on(OrderCreatedEvent.EVENT_NAME, (event: OrderCreatedEvent) => {
      emitted.push(event);
    });
    useCase = new CreateOrderUseCase(
      orderService,
      new MemoryTransactionManager(),
      eventEmitter,
    );
  });

  it('given: 유효한 주문 요청 / when: execute / then: 주문과 주문 상품을 저장하고 order.created 를 발행함', async () => {
    // when
    const result = await useCase.execute(orderCommand());

    // then
    expect(result).toEqual({ orderId: 1, duplicate: false });

    const order = await orderService.getOrder(1);
    expect(order.userName).toBe('swn');
    expect(order.totalPrice.toString()).toBe('50.00');
    expect(order.items).toHaveLength(1);
    expect(order.items[0].orderId).toBe(1);
    expect(order.shippingAddress.equals(order.billingAddress)).toBe(true);

    expect(emitted).toEqual([
      new OrderCreatedEvent(1, 'swn', 'test@example.com', '50.00', null),
    ]);
  });

  it('given: 세 필드가 잘못됨 / when: execute / then: 세 필드를 모두 담은 ValidationException, 저장하지 않음', async () => {
    // given
    const command = orderCommand();
    command.userName = '';
    command.shippingAddress.zipCode = '';
    command.items[0].quantity = 0;

    // when
    let caught: unknown;
    try {
      await useCase.execute(command);
    } catch (error) {
      caught = error;
    }

    // then
    expect(caught).toBeInstanceOf(ValidationException);
    if (!(caught instanceof ValidationException)) {
      return;
    }
    expect(caught.errorCode).toBe(ErrorCode.ORDER_VALIDATION_FAILED);
    expect(caught.fieldErrors.map((e) => e.field).sort()).toEqual([
      'items.0.quantity',
      'shippingAddress.zipCode',
      'userName',
    ]);
    expect(orderRepository.count()).toBe(0);
    expect(emitted).toHaveLength(0);
  });

  it('저장소 컬럼 길이와 금액 범위를 넘는 값은 검증에서 거른다', async () => {
    // given
    const command = orderCommand();
    command.payment.cvv = '12345';
    command.shippingAddress.zipCode = 'z'.repeat(40);
    command.items[0].price = '100000000.00';

    // when
    let caught: unknown;
    try {
      await useCase.execute(command);
    } catch (error) {
      caught = error;
    }

    // then
    expect(caught).toBeInstanceOf(ValidationException);
    if (!(caught instanceof ValidationException)) {
      return;
    }
    expect(caught.fieldErrors.map((e) => e.field).sort()).toEqual([
      'items.0.price',
      'payment.cvv',
      'shippingAddress.zipCode',
    ]);
    expect(orderRepository.count()).toBe(0);
  });

  it('음수 단가와 알 수 없는 결제 수단은 검증에서 거른다', async () => {
    // given
    const unknownMethod: number = 9;
    const command = orderCommand();
    command.items[0].price = '-1.00';
    command.payment.paymentMethod = unknownMethod;

    // when
    const promise = useCase.execute(command);

    // then
    await expect(promise).rejects.toMatchObject({
      errorCode: ErrorCode.ORDER_VALIDATION_FAILED,
    });
    expect(orderRepository.count()).toBe(0);
  });

  it('requestId 가 없으면 같은 요청도 매번 새 주문을 만든다', async () => {
    // when
    const first = await useCase.execute(orderCommand());
    const second = await useCase.execute(orderCommand());

    // then
    expect(first.orderId).toBe(1);
    expect(second.orderId).toBe(2);
    expect(orderRepository.count()).toBe(2);
  });

  describe('requestId 멱등', () => {
    it('given: 같은 requestId 로 두 번 요청 / when: execute / then: 기존 주문을 돌려주고 이벤트는 한 번만 발행', async () => {
      // when
      const first = await useCase.execute(orderCommand('req-1'));
      const second = await useCase.execute(orderCommand('req-1'));

      // then
      expect(first).toEqual({ orderId: 1, duplicate: false });
      expect(second).toEqual({ orderId: 1, duplicate: true });
      expect(orderRepository.count()).toBe(1);
      expect(emitted).toHaveLength(1);
    });

    it('given: 조회 직후 다른 요청이 먼저 저장함 / when: 저장이 유니크 제약에 걸림 / then: 다시 읽어 기존 주문을 돌려줌', async () => {
      // given
      await useCase.execute(orderCommand('req-1'));
      jest.spyOn(orderService, 'findOrderIdByRequestId').mockResolvedValueOnce(null);

      // when
      const result = await useCase.execute(orderCommand('req-1'));

      // then
      expect(result).toEqual({ orderId: 1, duplicate: true });
      expect(orderRepository.count()).toBe(1);
      expect(emitted).toHaveLength(1);
    });
  });

  it('저장 실패는 RepositoryException 그대로 전파한다', async () => {
    // given
    const failure = new RepositoryException(
      ErrorCode.PERSISTENCE_FAILED,
      new Error('connection lost'),
    );
    jest.spyOn(orderRepository, 'save').mockRejectedValueOnce(failure);

    // when
    const promise = useCase.execute(orderCommand());

    // then
    await expect(promise).rejects.toBe(failure);
    expect(emitted).toHaveLength(0);
  });

  describe('GetOrdersUseCase', () => {
    it('사용자의 주문을 금액 문자열과 함께 돌려준다', async () => {
      // given
      await useCase.execute(orderCommand());
      const getOrders = new GetOrdersUseCase(orderService);

      // when
      const results = await getOrders.execute('swn');

      // then
      expect(results).toHaveLength(1);
      expect(results[0].orderId).toBe(1);
      expect(results[0].totalPrice).toBe('50.00');
      expect(results[0].status).toBe('PENDING');
      expect(results[0].items).toEqual([
        {
          orderItemId: 1,
          productId: 'p-1',
          productName: 'Test Product',
          quantity: 2,
          price: '25.00',
          subtotal: '50.00',
        },
      ]);
      expect(await getOrders.execute('nobody')).toEqual([]);
    });
  });
});
