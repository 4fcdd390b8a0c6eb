import { IsString, IsNotEmpty, IsNumber, IsDate, IsEnum, IsOptional } from 'class-validator';

export enum TransactionType {
  PURCHASE = 'Purchase',
  SALE = 'Sale',
  RENT_PAYMENT = 'Rent Payment',
  RENT_INCOME = 'Rent Income',
}

export class UnifiedTransactionDto {
  @IsString()
  @IsNotEmpty()
  id!: string; // record id

  @IsEnum(TransactionType)
  type!: TransactionType;

  @IsNumber()
  propertyId!: number;

  @IsString()
  @IsNotEmpty()
  amount!: string; // wei

  @IsNumber()
  notificationSequence!: number;

  @IsDate()
  timestamp!: Date;

  @IsString()
  counterparty!: string; // the other side: seller for a purchase, renter for rent income, ...

  @IsString()
  @IsOptional()
  channel?: string; // 'offer' | 'auction' for sales

  @IsNumber()
  @IsOptional()
  months?: number; // for rent payments
}
