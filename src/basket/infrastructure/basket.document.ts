import { plainToInstance, Type } from 'class-transformer';
import {
  IsArray,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  validateSync,
  ValidateNested,
} from 'class-validator';
import { ErrorCode, RepositoryException } from '@common/exception';
import { Money } from '@common/money/money.vo';
import { ShoppingCart } from '@/basket/domain/entities/shopping-cart.entity';
import { ShoppingCartItem } from '@/basket/domain/entities/shopping-cart-item.entity';

class BasketItemDocument {
  @IsString()
  productId!: string;

  @IsString()
  productName!: string;

  @IsInt()
  quantity!: number;

  @IsString()
  @Matches(/^\d+(\.\d{1,2})?$/)
  price!: string;

  @IsOptional()
  @IsString()
  color?: string | null;
}

/**
 * Redis 에 저장되는 장바구니 JSON 문서
 */
class BasketDocument {
  @IsString()
  userName!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => BasketItemDocument)
  items!: BasketItemDocument[];
}

export function encodeBasket(cart: ShoppingCart): string {
  const document: BasketDocument = {
    userName: cart.userName,
    items: cart.items.map((item) => ({
      productId: item.productId,
      productName: item.productName,
      quantity: item.quantity,
      price: item.price.toString(),
      color: item.color,
    })),
  };
  return JSON.stringify(document);
}

export function decodeBasket(raw: string): ShoppingCart {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new RepositoryException(
      ErrorCode.PERSISTENCE_FAILED,
      error instanceof Error ? error : undefined,
    );
  }
  if (typeof json !== 'object' || json === null || Array.isArray(json)) {
    throw new RepositoryException(ErrorCode.PERSISTENCE_FAILED);
  }

  const document = plainToInstance(BasketDocument, json);
  if (validateSync(document).length > 0) {
    throw new RepositoryException(ErrorCode.PERSISTENCE_FAILED);
  }

  return new ShoppingCart(
    document.userName,
    document.items.map(
      (item) =>
        new ShoppingCartItem(
          item.productId,
          item.productName,
          item.quantity,
          Money.parse(item.price),
          item.color ?? null,
        ),
    ),
  );
}
