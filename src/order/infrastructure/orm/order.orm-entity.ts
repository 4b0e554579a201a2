import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { OrderItemEntity } from './order-item.orm-entity';

@Entity('orders')
export class OrderEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Index()
  @Column({ name: 'user_name', type: 'varchar', length: 100 })
  userName!: string;

  @Column({ name: 'order_name', type: 'varchar', length: 100 })
  orderName!: string;

  // 조회 편의를 위한 비정규화 값 (항상 주문 상품 소계의 합으로 기록)
  @Column({ name: 'total_price', type: 'decimal', precision: 10, scale: 2 })
  totalPrice!: string;

  @Column({ type: 'varchar', length: 20, default: 'PENDING' })
  status!: string;

  // 배송지
  @Column({ name: 'shipping_first_name', type: 'varchar', length: 100 })
  shippingFirstName!: string;

  @Column({ name: 'shipping_last_name', type: 'varchar', length: 100 })
  shippingLastName!: string;

  @Column({ name: 'shipping_email_address', type: 'varchar', length: 255 })
  shippingEmailAddress!: string;

  @Column({ name: 'shipping_address_line', type: 'varchar', length: 255 })
  shippingAddressLine!: string;

  @Column({ name: 'shipping_country', type: 'varchar', length: 100 })
  shippingCountry!: string;

  @Column({ name: 'shipping_state', type: 'varchar', length: 100 })
  shippingState!: string;

  @Column({ name: 'shipping_zip_code', type: 'varchar', length: 20 })
  shippingZipCode!: string;

  // 청구지
  @Column({ name: 'billing_first_name', type: 'varchar', length: 100 })
  billingFirstName!: string;

  @Column({ name: 'billing_last_name', type: 'varchar', length: 100 })
  billingLastName!: string;

  @Column({ name: 'billing_email_address', type: 'varchar', length: 255 })
  billingEmailAddress!: string;

  @Column({ name: 'billing_address_line', type: 'varchar', length: 255 })
  billingAddressLine!: string;

  @Column({ name: 'billing_country', type: 'varchar', length: 100 })
  billingCountry!: string;

  @Column({ name: 'billing_state', type: 'varchar', length: 100 })
  billingState!: string;

  @Column({ name: 'billing_zip_code', type: 'varchar', length: 20 })
  billingZipCode!: string;

  // 결제 (placeholder)
  @Column({ name: 'card_name', type: 'varchar', length: 100 })
  cardName!: string;

  @Column({ name: 'card_number', type: 'varchar', length: 32 })
  cardNumber!: string;

  @Column({ type: 'varchar', length: 10 })
  expiration!: string;

  @Column({ type: 'varchar', length: 4 })
  cvv!: string;

  @Column({ name: 'payment_method', type: 'int' })
  paymentMethod!: number;

  // 멱등 키 (체크아웃 이벤트 ID). NULL 은 중복 허용
  @Index({ unique: true })
  @Column({ name: 'request_id', type: 'varchar', length: 64, nullable: true })
  requestId!: string | null;

  @CreateDateColumn({ name: 'created_at', type: 'datetime' })
  createdAt!: Date;

  @OneToMany(() => OrderItemEntity, (item) => item.order, {
    cascade: ['insert'],
  })
  items!: OrderItemEntity[];
}
