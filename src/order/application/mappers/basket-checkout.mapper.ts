import { BasketCheckoutEvent } from '@common/events/basket-checkout.event';
import {
  AddressInput,
  CreateOrderCommand,
  OrderItemInput,
  PaymentInput,
} from '../dto/create-order.dto';

export interface CheckoutMappingOptions {
  // true 면 이벤트 ID 를 멱등 키(requestId)로 사용
  useEventIdAsRequestId: boolean;
}

/**
 * 체크아웃 이벤트 → 주문 생성 커맨드
 * 이벤트의 주소를 배송지/청구지 모두에 사용하고, 주문명은 사용자 이름을 쓴다.
 * 값의 유효성은 판단하지 않는다 (주문 생성 파이프라인이 검증).
 */
export function toCreateOrderCommand(
  event: BasketCheckoutEvent,
  options: CheckoutMappingOptions,
): CreateOrderCommand {
  const command = new CreateOrderCommand();
  command.userName = event.userName;
  command.orderName = event.userName;
  command.shippingAddress = toAddressInput(event);
  command.billingAddress = toAddressInput(event);

  const payment = new PaymentInput();
  payment.cardName = event.cardName;
  payment.cardNumber = event.cardNumber;
  payment.expiration = event.expiration;
  payment.cvv = event.cvv;
  // 알 수 없는 값은 그대로 넘겨 파이프라인의 IsEnum 검증에서 걸리게 한다
  payment.paymentMethod = event.paymentMethod;
  command.payment = payment;

  command.items = event.items.map((item) => {
    const input = new OrderItemInput();
    input.productId = item.productId;
    input.productName = item.productName;
    input.quantity = item.quantity;
    input.price = item.price.toString();
    return input;
  });
  command.requestId = options.useEventIdAsRequestId ? event.id : null;
  return command;
}

function toAddressInput(event: BasketCheckoutEvent): AddressInput {
  const address = new AddressInput();
  address.firstName = event.firstName;
  address.lastName = event.lastName;
  address.emailAddress = event.emailAddress;
  address.addressLine = event.addressLine;
  address.country = event.country;
  address.state = event.state;
  address.zipCode = event.zipCode;
  return address;
}

