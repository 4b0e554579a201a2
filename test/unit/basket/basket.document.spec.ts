import { decodeBasket, encodeBasket } from '@/basket/infrastructure/basket.document';
import { ErrorCode, RepositoryException } from '@common/exception';
import { swnBasket } from '../../helpers/fixtures';

describe('Basket 문서 (Redis)', () => {
  it('장바구니를 JSON 문서로 저장하고 다시 읽는다', () => {
    // given
    const raw = encodeBasket(swnBasket());

    // when
    const cart = decodeBasket(raw);

    // then
    expect(JSON.parse(raw)).toEqual({
      userName: 'swn',
      items: [
        {
          productId: 'p-1',
          productName: 'Test Product',
          quantity: 2,
          price: '25.00',
          color: 'Red',
        },
      ],
    });
    expect(cart.userName).toBe('swn');
    expect(cart.totalPrice.toString()).toBe('50.00');
  });

  it.each([
    ['깨진 JSON', '{'],
    ['배열', '[]'],
    ['필드 누락', '{"userName":"swn"}'],
    ['잘못된 금액', '{"userName":"swn","items":[{"productId":"p-1","productName":"x","quantity":1,"price":"1.234"}]}'],
  ])('%s 문서는 PERSISTENCE_FAILED 예외를 던진다', (_, raw) => {
    expect(() => decodeBasket(raw)).toThrow(RepositoryException);
    expect(() => decodeBasket(raw)).toThrow(
      expect.objectContaining({ errorCode: ErrorCode.PERSISTENCE_FAILED }),
    );
  });
});
