import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index, Unique } from 'typeorm';

export type SaleChannel = 'offer' | 'auction';

@Entity('historical_sales')
@Unique(['runId', 'notificationSequence'])
export class HistoricalSale {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' }) // Process lifetime the notification belongs to; sequences restart per run
  runId!: string;

  @Column() // Sequence number of the notification that recorded the sale
  notificationSequence!: number;

  @Column()
  @Index()
  propertyId!: number;

  @Column()
  @Index()
  buyerAddress!: string;

  @Column()
  @Index()
  sellerAddress!: string;

  @Column({ type: 'varchar' }) // wei, stored as string (from bigint)
  price!: string;

  @Column({ type: 'varchar', length: 16 })
  channel!: SaleChannel;

  @Column({ type: 'timestamp with time zone' }) // Chain time of the sale
  timestamp!: Date;

  @CreateDateColumn()
  indexedAt!: Date;
}
