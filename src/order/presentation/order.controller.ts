import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';

// DTOs
import {
  CreateOrderRequest,
  CreateOrderResponse,
} from './dto/create-order.dto';
import { GetOrdersRequest, GetOrdersResponse } from './dto/get-orders.dto';
import { GetOrdersResult } from '@/order/application/dto/get-orders.dto';

// Use Cases
import { CreateOrderUseCase } from '@/order/application/create-order.use-case';
import { GetOrdersUseCase } from '@/order/application/get-orders.use-case';
import { GetOrderDetailUseCase } from '@/order/application/get-order-detail.use-case';

/**
 * Order Controller
 * 주문 API 엔드포인트
 */
@ApiTags('orders')
@Controller('api/v1/orders')
export class OrderController {
  constructor(
    private readonly createOrderUseCase: CreateOrderUseCase,
    private readonly getOrdersUseCase: GetOrdersUseCase,
    private readonly getOrderDetailUseCase: GetOrderDetailUseCase,
  ) {}

  /**
   * ANCHOR 주문 생성
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: '주문 생성',
    description:
      '체크아웃 컨슈머와 같은 주문 생성 파이프라인으로 주문을 생성합니다.',
  })
  @ApiResponse({ status: 201, type: CreateOrderResponse })
  @ApiResponse({ status: 400, description: '요청 값 검증 실패 (실패한 필드 전체)' })
  async createOrder(
    @Body() dto: CreateOrderRequest,
  ): Promise<CreateOrderResponse> {
    const result = await this.createOrderUseCase.execute(
      CreateOrderRequest.toCommand(dto),
    );
    return CreateOrderResponse.fromResult(result);
  }

  /**
   * ANCHOR 사용자 주문 내역 조회
   */
  @Get()
  @ApiOperation({ summary: '주문 내역 조회' })
  @ApiResponse({ status: 200, type: GetOrdersResponse })
  async getOrders(@Query() query: GetOrdersRequest): Promise<GetOrdersResponse> {
    const results = await this.getOrdersUseCase.execute(query.userName);
    return GetOrdersResponse.fromResults(results);
  }

  /**
   * ANCHOR 주문 상세 조회
   */
  @Get(':orderId')
  @ApiOperation({ summary: '주문 상세 조회' })
  @ApiParam({ name: 'orderId', description: '주문 ID' })
  @ApiResponse({ status: 200, type: GetOrdersResult })
  @ApiResponse({ status: 404, description: '주문을 찾을 수 없음' })
  async getOrder(
    @Param('orderId', ParseIntPipe) orderId: number,
  ): Promise<GetOrdersResult> {
    return this.getOrderDetailUseCase.execute(orderId);
  }
}
