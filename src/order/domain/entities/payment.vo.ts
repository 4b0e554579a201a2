import { PaymentMethod } from './payment-method.enum';

/**
 * Payment Value Object
 * 카드 정보는 placeholder 값만 다룬다.
 */
export class Payment {
  constructor(
    public readonly cardName: string,
    public readonly cardNumber: string,
    public readonly expiration: string,
    public readonly cvv: string,
    public readonly paymentMethod: PaymentMethod,
  ) {}
}
