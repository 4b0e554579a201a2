import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';

// DTOs
import { GetBasketResponse } from './dto/get-basket.dto';
import { StoreBasketRequest } from './dto/store-basket.dto';
import {
  CheckoutBasketRequest,
  CheckoutBasketResponse,
} from './dto/checkout-basket.dto';

// Use Cases
import { GetBasketUseCase } from '@/basket/application/get-basket.use-case';
import { StoreBasketUseCase } from '@/basket/application/store-basket.use-case';
import { DeleteBasketUseCase } from '@/basket/application/delete-basket.use-case';
import { CheckoutBasketUseCase } from '@/basket/application/checkout-basket.use-case';

/**
 * Basket Controller
 * 장바구니 관리 및 체크아웃 API 엔드포인트
 */
@ApiTags('basket')
@Controller('api/v1/basket')
export class BasketController {
  constructor(
    private readonly getBasketUseCase: GetBasketUseCase,
    private readonly storeBasketUseCase: StoreBasketUseCase,
    private readonly deleteBasketUseCase: DeleteBasketUseCase,
    private readonly checkoutBasketUseCase: CheckoutBasketUseCase,
  ) {}

  /**
   * ANCHOR 장바구니 조회
   */
  @Get(':userName')
  @ApiOperation({
    summary: '장바구니 조회',
    description: '사용자의 장바구니를 조회합니다. 없으면 빈 장바구니를 반환합니다.',
  })
  @ApiParam({ name: 'userName', description: '사용자 이름' })
  @ApiResponse({ status: 200, type: GetBasketResponse })
  async getBasket(
    @Param('userName') userName: string,
  ): Promise<GetBasketResponse> {
    const result = await this.getBasketUseCase.execute(userName);
    return GetBasketResponse.fromResult(result);
  }

  /**
   * ANCHOR 장바구니 저장
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: '장바구니 저장',
    description: '사용자의 장바구니를 통째로 저장합니다.',
  })
  @ApiResponse({ status: 200, type: GetBasketResponse })
  @ApiResponse({ status: 400, description: '요청 값 검증 실패' })
  async storeBasket(
    @Body() dto: StoreBasketRequest,
  ): Promise<GetBasketResponse> {
    const result = await this.storeBasketUseCase.execute(
      StoreBasketRequest.toCommand(dto),
    );
    return GetBasketResponse.fromResult(result);
  }

  /**
   * ANCHOR 장바구니 삭제
   */
  @Delete(':userName')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: '장바구니 삭제' })
  @ApiParam({ name: 'userName', description: '사용자 이름' })
  @ApiResponse({ status: 204, description: '삭제 완료' })
  @ApiResponse({ status: 404, description: '장바구니를 찾을 수 없음' })
  async deleteBasket(@Param('userName') userName: string): Promise<void> {
    await this.deleteBasketUseCase.execute(userName);
  }

  /**
   * ANCHOR 체크아웃
   */
  @Post('checkout')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({
    summary: '장바구니 체크아웃',
    description:
      '장바구니를 삭제하고 체크아웃 이벤트를 발행합니다. 주문은 비동기로 생성됩니다.',
  })
  @ApiResponse({ status: 202, type: CheckoutBasketResponse })
  @ApiResponse({ status: 404, description: '장바구니를 찾을 수 없음' })
  @ApiResponse({ status: 503, description: '체크아웃 이벤트 발행 실패' })
  async checkout(
    @Body() dto: CheckoutBasketRequest,
  ): Promise<CheckoutBasketResponse> {
    const result = await this.checkoutBasketUseCase.execute(
      CheckoutBasketRequest.toCommand(dto),
    );
    return CheckoutBasketResponse.fromResult(result);
  }
}
