import { Injectable } from '@nestjs/common';
import { OrderDomainService } from '@/order/domain/services/order.service';
import { GetOrdersResult } from './dto/get-orders.dto';

@Injectable()
export class GetOrderDetailUseCase {
  constructor(private readonly orderService: OrderDomainService) {}

  /**
   * ANCHOR 주문 상세 조회 (없으면 ORDER_NOT_FOUND)
   */
  async execute(orderId: number): Promise<GetOrdersResult> {
    const order = await this.orderService.getOrder(orderId);

    return GetOrdersResult.fromDomain(order);
  }
}
