import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, Index, Unique } from 'typeorm';

export type RentPaymentKind = 'lease' | 'extension';

@Entity('rent_payment_records')
@Unique(['runId', 'notificationSequence'])
export class RentPaymentRecord {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  runId!: string;

  @Column()
  notificationSequence!: number;

  @Column()
  @Index()
  propertyId!: number;

  @Column()
  @Index()
  renterAddress!: string;

  @Column()
  @Index()
  landlordAddress!: string;

  @Column()
  months!: number;

  @Column()
  amount!: string; // wei, stored as string (from bigint)

  @Column({ type: 'varchar', length: 16 })
  kind!: RentPaymentKind;

  @Column({ type: 'timestamp with time zone' })
  @Index()
  timestamp!: Date;

  @CreateDateColumn()
  indexedAt!: Date;
}
