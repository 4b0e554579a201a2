/**
 * Address Value Object
 * 배송지/청구지
 */
export class Address {
  constructor(
    public readonly firstName: string,
    public readonly lastName: string,
    public readonly emailAddress: string,
    public readonly addressLine: string,
    public readonly country: string,
    public readonly state: string,
    public readonly zipCode: string,
  ) {}

  equals(other: Address): boolean {
    return (
      this.firstName === other.firstName &&
      this.lastName === other.lastName &&
      this.emailAddress === other.emailAddress &&
      this.addressLine === other.addressLine &&
      this.country === other.country &&
      this.state === other.state &&
      this.zipCode === other.zipCode
    );
  }
}
