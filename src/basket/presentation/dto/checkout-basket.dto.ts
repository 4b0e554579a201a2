import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsEmail,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
} from 'class-validator';
import {
  CheckoutBasketCommand,
  CheckoutBasketResult,
  CheckoutStatus,
} from '@/basket/application/dto/checkout-basket.dto';

/**
 * 체크아웃 요청 DTO
 * 금액/상품은 서버의 장바구니에서 계산하므로 받지 않는다.
 */
export class CheckoutBasketRequest {
  @ApiProperty({ description: '사용자 이름', example: 'swn' })
  @IsString()
  @IsNotEmpty()
  userName!: string;

  @ApiProperty({ example: 'Jane' })
  @IsString()
  @IsNotEmpty()
  firstName!: string;

  @ApiProperty({ example: 'Doe' })
  @IsString()
  @IsNotEmpty()
  lastName!: string;

  @ApiProperty({ example: 'test@example.com' })
  @IsEmail()
  emailAddress!: string;

  @ApiProperty({ example: '1 Main St' })
  @IsString()
  @IsNotEmpty()
  addressLine!: string;

  @ApiProperty({ example: 'KR' })
  @IsString()
  @IsNotEmpty()
  country!: string;

  @ApiProperty({ example: 'Seoul' })
  @IsString()
  @IsNotEmpty()
  state!: string;

  @ApiProperty({ example: '04524' })
  @IsString()
  @IsNotEmpty()
  zipCode!: string;

  @ApiProperty({ example: 'Test Card' })
  @IsString()
  @IsNotEmpty()
  cardName!: string;

  @ApiProperty({ example: '0000000000000000' })
  @IsString()
  @IsNotEmpty()
  cardNumber!: string;

  @ApiProperty({ example: '12/30' })
  @IsString()
  @IsNotEmpty()
  expiration!: string;

  @ApiProperty({ example: '000' })
  @IsString()
  @IsNotEmpty()
  cvv!: string;

  @ApiProperty({
    description: '결제 수단 (1: CreditCard, 2: DebitCard, 3: Paypal)',
    example: 1,
  })
  @IsInt()
  @IsIn([1, 2, 3])
  paymentMethod!: number;

  @ApiPropertyOptional({ description: '요청 상관관계 ID' })
  @IsOptional()
  @IsString()
  requestId?: string;

  static toCommand(dto: CheckoutBasketRequest): CheckoutBasketCommand {
    return {
      userName: dto.userName,
      firstName: dto.firstName,
      lastName: dto.lastName,
      emailAddress: dto.emailAddress,
      addressLine: dto.addressLine,
      country: dto.country,
      state: dto.state,
      zipCode: dto.zipCode,
      cardName: dto.cardName,
      cardNumber: dto.cardNumber,
      expiration: dto.expiration,
      cvv: dto.cvv,
      paymentMethod: dto.paymentMethod,
      requestId: dto.requestId ?? null,
    };
  }
}

/**
 * 체크아웃 응답 DTO
 */
export class CheckoutBasketResponse {
  @ApiProperty({ description: '체크아웃 이벤트 ID' })
  eventId!: string;

  @ApiProperty({ example: 'swn' })
  userName!: string;

  @ApiProperty({ example: '50.00' })
  totalPrice!: string;

  @ApiProperty({ enum: ['PUBLISHED', 'QUEUED'] })
  status!: CheckoutStatus;

  static fromResult(result: CheckoutBasketResult): CheckoutBasketResponse {
    const response = new CheckoutBasketResponse();
    response.eventId = result.eventId;
    response.userName = result.userName;
    response.totalPrice = result.totalPrice;
    response.status = result.status;
    return response;
  }
}
