import { Injectable } from '@nestjs/common';
import { ApplicationException, ErrorCode } from '@common/exception';
import { IBasketRepository } from '@/basket/domain/interfaces/basket.repository.interface';

@Injectable()
export class DeleteBasketUseCase {
  constructor(private readonly basketRepository: IBasketRepository) {}

  /**
   * ANCHOR 장바구니 삭제
   */
  async execute(userName: string): Promise<void> {
    const deleted = await this.basketRepository.deleteBasket(userName);
    if (!deleted) {
      throw new ApplicationException(ErrorCode.BASKET_NOT_FOUND);
    }
  }
}
