import { ApiProperty } from '@nestjs/swagger';
import { GetBasketResult } from '@/basket/application/dto/get-basket.dto';

class BasketItemView {
  @ApiProperty({ example: 'p-1' })
  productId!: string;

  @ApiProperty({ example: 'Test Product' })
  productName!: string;

  @ApiProperty({ example: 2 })
  quantity!: number;

  @ApiProperty({ example: '25.00' })
  price!: string;

  @ApiProperty({ example: 'Black', nullable: true, type: String })
  color!: string | null;
}

/**
 * 장바구니 조회 응답 DTO
 */
export class GetBasketResponse {
  @ApiProperty({ description: '사용자 이름', example: 'swn' })
  userName!: string;

  @ApiProperty({ description: '장바구니 상품 목록', type: [BasketItemView] })
  items!: BasketItemView[];

  @ApiProperty({ description: '합계 (상품 소계의 합)', example: '50.00' })
  totalPrice!: string;

  static fromResult(result: GetBasketResult): GetBasketResponse {
    const response = new GetBasketResponse();
    response.userName = result.userName;
    response.items = result.items;
    response.totalPrice = result.totalPrice;
    return response;
  }
}
