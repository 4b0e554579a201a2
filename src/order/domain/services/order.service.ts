import { Injectable } from '@nestjs/common';
import { ApplicationException, ErrorCode } from '@common/exception';
import { IOrderRepository } from '@/order/domain/interfaces/order.repository.interface';
import { Order } from '../entities/order.entity';

/**
 * OrderDomainService
 * 주문 관련 영속성 계층과 상호작용하며 핵심 비즈니스 로직을 담당한다.
 */
@Injectable()
export class OrderDomainService {
  constructor(private readonly orderRepository: IOrderRepository) {}

  /**
   * ANCHOR 주문 저장 (주문 + 주문 상품)
   */
  async placeOrder(order: Order): Promise<number> {
    return this.orderRepository.save(order);
  }

  /**
   * ANCHOR 같은 요청으로 이미 생성된 주문 ID 조회
   */
  async findOrderIdByRequestId(requestId: string): Promise<number | null> {
    return this.orderRepository.findIdByRequestId(requestId);
  }

  /**
   * ANCHOR 주문 조회
   */
  async getOrder(orderId: number): Promise<Order> {
    const order = await this.orderRepository.findById(orderId);
    if (!order) {
      throw new ApplicationException(ErrorCode.ORDER_NOT_FOUND);
    }
    return order;
  }

  /**
   * ANCHOR 사용자 주문 목록 조회
   */
  async getOrdersByUserName(userName: string): Promise<Order[]> {
    return this.orderRepository.findManyByUserName(userName);
  }
}
