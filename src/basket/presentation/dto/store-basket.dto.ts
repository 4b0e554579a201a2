import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Min,
  ValidateNested,
} from 'class-validator';
import { StoreBasketCommand } from '@/basket/application/dto/store-basket.dto';

export class BasketItemRequest {
  @ApiProperty({ description: '상품 ID', example: 'p-1' })
  @IsString()
  @IsNotEmpty()
  productId!: string;

  @ApiProperty({ description: '상품명', example: 'Test Product' })
  @IsString()
  @IsNotEmpty()
  productName!: string;

  @ApiProperty({ description: '수량', example: 2, minimum: 1 })
  @IsInt()
  @Min(1)
  quantity!: number;

  @ApiProperty({ description: '단가 (소수점 2자리 이하)', example: '25.00' })
  @IsString()
  @Matches(/^\d+(\.\d{1,2})?$/)
  price!: string;

  @ApiPropertyOptional({ description: '색상', example: 'Black' })
  @IsOptional()
  @IsString()
  color?: string;
}

/**
 * 장바구니 저장 요청 DTO
 */
export class StoreBasketRequest {
  @ApiProperty({ description: '사용자 이름', example: 'swn' })
  @IsString()
  @IsNotEmpty()
  userName!: string;

  @ApiProperty({ description: '장바구니 상품 목록', type: [BasketItemRequest] })
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => BasketItemRequest)
  items!: BasketItemRequest[];

  static toCommand(dto: StoreBasketRequest): StoreBasketCommand {
    return {
      userName: dto.userName,
      items: dto.items.map((item) => ({
        productId: item.productId,
        productName: item.productName,
        quantity: item.quantity,
        price: item.price,
        color: item.color ?? null,
      })),
    };
  }
}
