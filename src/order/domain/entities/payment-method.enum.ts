export enum PaymentMethod {
  CreditCard = 1,
  DebitCard = 2,
  Paypal = 3,
}
