import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ChainModule } from './modules/chain/chain.module';
import { NotificationsModule } from './modules/notifications/notifications.module';
import { ManagersModule } from './modules/managers/managers.module';
import { PropertiesModule } from './modules/properties/properties.module';
import { MarketplaceModule } from './modules/marketplace/marketplace.module';
import { RentModule } from './modules/rent/rent.module';
import { AuctionModule } from './modules/auction/auction.module';
import { TransactionsModule } from './modules/transactions/transactions.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        url: configService.get<string>('DATABASE_URL'),
        synchronize: configService.get('NODE_ENV') !== 'production', // Only synchronize in non-production
        ssl: configService.get('NODE_ENV') === 'production'
          ? { rejectUnauthorized: false }
          : false,
        extra: {
          max: 20, // Maximum connections in the pool
          connectionTimeoutMillis: 5000,
        },
        autoLoadEntities: true,
      }),
      inject: [ConfigService],
    }),
    ChainModule,
    NotificationsModule,
    ManagersModule,
    PropertiesModule,
    MarketplaceModule,
    RentModule,
    AuctionModule,
    TransactionsModule,
  ],
})
export class AppModule {}
