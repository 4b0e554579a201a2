import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';
import { GetOrdersResult } from '@/order/application/dto/get-orders.dto';

/**
 * 주문 내역 조회 요청 DTO (query)
 */
export class GetOrdersRequest {
  @ApiProperty({ description: '사용자 이름', example: 'swn' })
  @IsString()
  @IsNotEmpty()
  userName!: string;
}

/**
 * 주문 내역 조회 응답 DTO
 */
export class GetOrdersResponse {
  @ApiProperty({ description: '주문 목록 (최신순)', type: [GetOrdersResult] })
  data!: GetOrdersResult[];

  static fromResults(results: GetOrdersResult[]): GetOrdersResponse {
    const response = new GetOrdersResponse();
    response.data = results;
    return response;
  }
}
