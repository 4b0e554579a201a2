import { Injectable } from '@nestjs/common';
import { Money } from '@common/money/money.vo';
import { ShoppingCart } from '@/basket/domain/entities/shopping-cart.entity';
import { ShoppingCartItem } from '@/basket/domain/entities/shopping-cart-item.entity';
import { IBasketRepository } from '@/basket/domain/interfaces/basket.repository.interface';
import { GetBasketResult } from './dto/get-basket.dto';
import { StoreBasketCommand } from './dto/store-basket.dto';

@Injectable()
export class StoreBasketUseCase {
  constructor(private readonly basketRepository: IBasketRepository) {}

  /**
   * ANCHOR 장바구니 저장 (전체 교체)
   */
  async execute(cmd: StoreBasketCommand): Promise<GetBasketResult> {
    const cart = new ShoppingCart(
      cmd.userName,
      cmd.items.map(
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

    const stored = await this.basketRepository.storeBasket(cart);
    return GetBasketResult.fromDomain(stored);
  }
}
