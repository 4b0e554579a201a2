import { Order } from '@/order/domain/entities/order.entity';
import { Address } from '@/order/domain/entities/address.vo';

export interface OrderAddressResult {
  firstName: string;
  lastName: string;
  emailAddress: string;
  addressLine: string;
  country: string;
  state: string;
  zipCode: string;
}

export interface OrderItemResult {
  orderItemId: number;
  productId: string;
  productName: string;
  quantity: number;
  price: string;
  subtotal: string;
}

/**
 * 애플리케이션 레이어 DTO: GetOrders 응답 (단일 주문)
 * 카드 정보는 결제 수단만 노출한다.
 */
export class GetOrdersResult {
  constructor(
    public readonly orderId: number,
    public readonly userName: string,
    public readonly orderName: string,
    public readonly totalPrice: string,
    public readonly status: string,
    public readonly paymentMethod: number,
    public readonly shippingAddress: OrderAddressResult,
    public readonly billingAddress: OrderAddressResult,
    public readonly items: OrderItemResult[],
    public readonly createdAt: Date,
  ) {}

  static fromDomain(order: Order): GetOrdersResult {
    return new GetOrdersResult(
      order.id,
      order.userName,
      order.orderName,
      order.totalPrice.toString(),
      order.status.value,
      order.payment.paymentMethod,
      toAddressResult(order.shippingAddress),
      toAddressResult(order.billingAddress),
      order.items.map((item) => ({
        orderItemId: item.id,
        productId: item.productId,
        productName: item.productName,
        quantity: item.quantity,
        price: item.price.toString(),
        subtotal: item.subtotal.toString(),
      })),
      order.createdAt,
    );
  }
}

function toAddressResult(address: Address): OrderAddressResult {
  return {
    firstName: address.firstName,
    lastName: address.lastName,
    emailAddress: address.emailAddress,
    addressLine: address.addressLine,
    country: address.country,
    state: address.state,
    zipCode: address.zipCode,
  };
}
