import { Order } from '@/order/domain/entities/order.entity';

/**
 * Order Repository Port
 * 주문 데이터 접근 계약 (주문과 주문 상품은 항상 함께 저장/조회)
 */
export abstract class IOrderRepository {
  /**
   * 주문과 주문 상품을 원자적으로 저장
   * @returns 생성된 주문 ID
   * @throws RepositoryException(DUPLICATE_ORDER_REQUEST) 같은 requestId 가 이미 있는 경우
   */
  abstract save(order: Order): Promise<number>;
  abstract findById(id: number): Promise<Order | null>;
  abstract findManyByUserName(userName: string): Promise<Order[]>;
  abstract findIdByRequestId(requestId: string): Promise<number | null>;
}
