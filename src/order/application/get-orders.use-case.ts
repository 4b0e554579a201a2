import { Injectable } from '@nestjs/common';
import { OrderDomainService } from '@/order/domain/services/order.service';
import { GetOrdersResult } from './dto/get-orders.dto';

@Injectable()
export class GetOrdersUseCase {
  constructor(private readonly orderService: OrderDomainService) {}

  /**
   * ANCHOR 사용자 주문 내역 조회 (최신순)
   */
  async execute(userName: string): Promise<GetOrdersResult[]> {
    const orders = await this.orderService.getOrdersByUserName(userName);

    return orders.map((order) => GetOrdersResult.fromDomain(order));
  }
}
