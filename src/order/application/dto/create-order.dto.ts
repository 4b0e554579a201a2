import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsDefined,
  IsEmail,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { PaymentMethod } from '@/order/domain/entities/payment-method.enum';

// 저장소 컬럼 범위 (order_items.quantity INT)
const MAX_QUANTITY = 2_147_483_647;

/**
 * 주소 입력 (배송지/청구지)
 */
export class AddressInput {
  @ApiProperty({ example: 'Jane' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  firstName!: string;

  @ApiProperty({ example: 'Doe' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  lastName!: string;

  @ApiProperty({ example: 'test@example.com' })
  @IsEmail()
  @MaxLength(255)
  emailAddress!: string;

  @ApiProperty({ example: '1 Main St' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  addressLine!: string;

  @ApiProperty({ example: 'KR' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  country!: string;

  @ApiProperty({ example: 'Seoul' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  state!: string;

  @ApiProperty({ example: '04524' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(20)
  zipCode!: string;
}

/**
 * 결제 입력 (placeholder 값)
 */
export class PaymentInput {
  @ApiProperty({ example: 'Test Card' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  cardName!: string;

  @ApiProperty({ example: '0000000000000000' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(32)
  cardNumber!: string;

  @ApiProperty({ example: '12/30' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(10)
  expiration!: string;

  @ApiProperty({ example: '000' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(4)
  cvv!: string;

  @ApiProperty({ enum: PaymentMethod, example: PaymentMethod.CreditCard })
  @IsEnum(PaymentMethod)
  paymentMethod!: PaymentMethod;
}

/**
 * 주문 항목 입력
 */
export class OrderItemInput {
  @ApiProperty({ example: 'p-1' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  productId!: string;

  @ApiProperty({ example: 'Test Product' })
  @IsString()
  @MaxLength(255)
  productName!: string;

  @ApiProperty({ example: 2, minimum: 1 })
  @IsInt()
  @Min(1)
  @Max(MAX_QUANTITY)
  quantity!: number;

  @ApiProperty({
    description: '단가 (0 이상 99999999.99 이하, 소수점 2자리 이하)',
    example: '25.00',
  })
  @IsString()
  @Matches(/^\d{1,8}(\.\d{1,2})?$/, {
    message: '$property 는 0 이상 99999999.99 이하, 소수점 2자리 이하의 금액이어야 합니다',
  })
  price!: string;
}

/**
 * 애플리케이션 레이어 DTO: CreateOrder 요청
 * 동기 API 와 체크아웃 컨슈머가 같은 검증 규칙을 사용한다.
 */
export class CreateOrderCommand {
  @ApiProperty({ description: '주문자 (사용자 이름)', example: 'swn' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  userName!: string;

  @ApiProperty({ description: '주문명', example: 'swn' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  orderName!: string;

  @ApiProperty({ type: AddressInput })
  @IsDefined()
  @ValidateNested()
  @Type(() => AddressInput)
  shippingAddress!: AddressInput;

  @ApiProperty({ type: AddressInput })
  @IsDefined()
  @ValidateNested()
  @Type(() => AddressInput)
  billingAddress!: AddressInput;

  @ApiProperty({ type: PaymentInput })
  @IsDefined()
  @ValidateNested()
  @Type(() => PaymentInput)
  payment!: PaymentInput;

  @ApiProperty({ type: [OrderItemInput] })
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => OrderItemInput)
  items!: OrderItemInput[];

  @ApiPropertyOptional({ description: '멱등 키 (같은 키의 주문은 한 번만 생성)' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  requestId?: string | null;
}

/**
 * 애플리케이션 레이어 DTO: CreateOrder 응답
 * duplicate: 같은 requestId 로 이미 생성된 주문을 돌려준 경우
 */
export class CreateOrderResult {
  constructor(
    public readonly orderId: number,
    public readonly duplicate: boolean,
  ) {}
}
