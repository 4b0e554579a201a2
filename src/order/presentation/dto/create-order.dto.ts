import { ApiProperty } from '@nestjs/swagger';
import {
  CreateOrderCommand,
  CreateOrderResult,
} from '@/order/application/dto/create-order.dto';

/**
 * 주문 생성 요청 DTO
 * 검증 규칙은 주문 생성 파이프라인 커맨드와 동일하다.
 */
export class CreateOrderRequest extends CreateOrderCommand {
  static toCommand(dto: CreateOrderRequest): CreateOrderCommand {
    const command = new CreateOrderCommand();
    command.userName = dto.userName;
    command.orderName = dto.orderName;
    command.shippingAddress = dto.shippingAddress;
    command.billingAddress = dto.billingAddress;
    command.payment = dto.payment;
    command.items = dto.items;
    command.requestId = dto.requestId ?? null;
    return command;
  }
}

/**
 * 주문 생성 응답 DTO
 */
export class CreateOrderResponse {
  @ApiProperty({ description: '주문 ID', example: 1 })
  orderId!: number;

  @ApiProperty({ description: '같은 requestId 로 이미 생성된 주문인지 여부' })
  duplicate!: boolean;

  static fromResult(result: CreateOrderResult): CreateOrderResponse {
    const response = new CreateOrderResponse();
    response.orderId = result.orderId;
    response.duplicate = result.duplicate;
    return response;
  }
}
