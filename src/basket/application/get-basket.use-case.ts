import { Injectable } from '@nestjs/common';
import { ShoppingCart } from '@/basket/domain/entities/shopping-cart.entity';
import { IBasketRepository } from '@/basket/domain/interfaces/basket.repository.interface';
import { GetBasketResult } from './dto/get-basket.dto';

@Injectable()
export class GetBasketUseCase {
  constructor(private readonly basketRepository: IBasketRepository) {}

  /**
   * ANCHOR 장바구니 조회 (없으면 빈 장바구니)
   */
  async execute(userName: string): Promise<GetBasketResult> {
    const basket =
      (await this.basketRepository.getBasket(userName)) ??
      new ShoppingCart(userName);
    return GetBasketResult.fromDomain(basket);
  }
}
