import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TransactionsService } from './transactions.service';
import { TransactionsController } from './transactions.controller';
import { HistoricalSale } from '../marketplace/entities/historical-sale.entity';
import { RentPaymentRecord } from '../rent/entities/rent-payment-record.entity';
import { NotificationsModule } from '../notifications/notifications.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([HistoricalSale, RentPaymentRecord]),
    NotificationsModule,
  ],
  controllers: [TransactionsController],
  providers: [TransactionsService],
})
export class TransactionsModule {}
