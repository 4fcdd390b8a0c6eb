import { randomUUID } from 'crypto';
import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { HistoricalSale } from '../marketplace/entities/historical-sale.entity';
import { RentPaymentRecord } from '../rent/entities/rent-payment-record.entity';
import { Notification, NotificationOf } from '../notifications/notification.types';
import { NotificationsService } from '../notifications/notifications.service';
import { UnifiedTransactionDto, TransactionType } from './dto/unified-transaction.dto';

@Injectable()
export class TransactionsService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(TransactionsService.name);
  private unsubscribe: (() => void) | null = null;
  // Committed batches are persisted one after another, in sequence order.
  private indexing: Promise<void> = Promise.resolve();
  // Notification numbering restarts with the in-memory state on every boot.
  readonly runId = randomUUID();

  constructor(
    @InjectRepository(HistoricalSale)
    private historicalSaleRepository: Repository<HistoricalSale>,
    @InjectRepository(RentPaymentRecord)
    private rentPaymentRecordRepository: Repository<RentPaymentRecord>,
    private notificationsService: NotificationsService,
  ) {}

  onModuleInit() {
    this.logger.log(`Subscribing to committed notifications (OfferAccepted, AuctionEnded, Rented, Extended) for run ${this.runId}...`);
    this.unsubscribe = this.notificationsService.subscribe(committed => {
      this.indexing = this.indexing
        .then(() => this.indexBatch(committed))
        .catch(error => {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.error(`Error indexing notifications ${committed[0].sequence}..${committed[committed.length - 1].sequence}: ${message}`);
        });
    });
  }

  onModuleDestroy() {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /** Resolves once every batch committed so far has been persisted (or failed). */
  flush(): Promise<void> {
    return this.indexing;
  }

  private async indexBatch(committed: readonly Notification[]): Promise<void> {
    for (const notification of committed) {
      switch (notification.kind) {
        case 'OfferAccepted':
          await this.recordSale(notification.sequence, notification.timestamp, {
            propertyId: notification.propertyId,
            buyerAddress: notification.buyer,
            sellerAddress: notification.seller,
            price: notification.amount.toString(),
            channel: 'offer',
          });
          break;
        case 'AuctionEnded':
          if (notification.winner !== null) {
            await this.recordSale(notification.sequence, notification.timestamp, {
              propertyId: notification.propertyId,
              buyerAddress: notification.winner,
              sellerAddress: notification.seller,
              price: notification.amount.toString(),
              channel: 'auction',
            });
          }
          break;
        case 'Rented':
        case 'Extended':
          await this.recordRentPayment(notification);
          break;
        default:
          break;
      }
    }
  }

  private async recordSale(
    sequence: number,
    timestamp: number,
    sale: Pick<HistoricalSale, 'propertyId' | 'buyerAddress' | 'sellerAddress' | 'price' | 'channel'>,
  ): Promise<void> {
    const existing = await this.historicalSaleRepository.findOne({
      where: { runId: this.runId, notificationSequence: sequence },
    });
    if (existing) {
      this.logger.log(`Historical sale for notification #${sequence} already exists.`);
      return;
    }
    const record = this.historicalSaleRepository.create({
      ...sale,
      runId: this.runId,
      notificationSequence: sequence,
      timestamp: new Date(timestamp * 1000),
    });
    await this.historicalSaleRepository.save(record);
    this.logger.log(`Saved historical sale of property ${sale.propertyId} (${sale.channel}) from notification #${sequence}`);
  }

  private async recordRentPayment(notification: NotificationOf<'Rented'> | NotificationOf<'Extended'>): Promise<void> {
    const existing = await this.rentPaymentRecordRepository.findOne({
      where: { runId: this.runId, notificationSequence: notification.sequence },
    });
    if (existing) {
      this.logger.log(`Rent payment for notification #${notification.sequence} already exists.`);
      return;
    }
    const lease = notification.kind === 'Rented';
    const record = this.rentPaymentRecordRepository.create({
      runId: this.runId,
      notificationSequence: notification.sequence,
      propertyId: notification.propertyId,
      renterAddress: notification.renter,
      landlordAddress: notification.landlord,
      months: lease ? notification.months : notification.additionalMonths,
      amount: (lease ? notification.totalPaid : notification.additionalPaid).toString(),
      kind: lease ? 'lease' : 'extension',
      timestamp: new Date(notification.timestamp * 1000),
    });
    await this.rentPaymentRecordRepository.save(record);
    this.logger.log(`Saved rent payment for property ${notification.propertyId} from notification #${notification.sequence}`);
  }

  async getUnifiedHistory(userAddress: string): Promise<UnifiedTransactionDto[]> {
    this.logger.log(`Fetching unified transaction history for ${userAddress}`);

    const sales = await this.historicalSaleRepository.find({
      where: [{ buyerAddress: userAddress }, { sellerAddress: userAddress }],
      order: { timestamp: 'DESC' },
    });
    const rentPayments = await this.rentPaymentRecordRepository.find({
      where: [{ renterAddress: userAddress }, { landlordAddress: userAddress }],
      order: { timestamp: 'DESC' },
    });
    this.logger.log(`Found ${sales.length} sales and ${rentPayments.length} rent payments for ${userAddress}`);

    const saleTransactions = sales.map((sale): UnifiedTransactionDto => {
      const purchase = sale.buyerAddress === userAddress;
      return {
        id: sale.id,
        type: purchase ? TransactionType.PURCHASE : TransactionType.SALE,
        propertyId: sale.propertyId,
        amount: sale.price,
        notificationSequence: sale.notificationSequence,
        timestamp: sale.timestamp,
        counterparty: purchase ? sale.sellerAddress : sale.buyerAddress,
        channel: sale.channel,
      };
    });

    const rentTransactions = rentPayments.map((payment): UnifiedTransactionDto => {
      const paidByUser = payment.renterAddress === userAddress;
      return {
        id: payment.id,
        type: paidByUser ? TransactionType.RENT_PAYMENT : TransactionType.RENT_INCOME,
        propertyId: payment.propertyId,
        amount: payment.amount,
        notificationSequence: payment.notificationSequence,
        timestamp: payment.timestamp,
        counterparty: paidByUser ? payment.landlordAddress : payment.renterAddress,
        months: payment.months,
      };
    });

    // Newest first; sequence breaks ties within the same second
    const combinedHistory = [...saleTransactions, ...rentTransactions];
    combinedHistory.sort(
      (a, b) => b.timestamp.getTime() - a.timestamp.getTime() || b.notificationSequence - a.notificationSequence,
    );

    this.logger.log(`Returning combined history of ${combinedHistory.length} items for ${userAddress}`);
    return combinedHistory;
  }
}
