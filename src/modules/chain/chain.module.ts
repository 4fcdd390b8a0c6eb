import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AccessControlService } from './access-control.service';
import { ChainClockService } from './chain-clock.service';
import { ChainStateService } from './chain-state.service';
import { ChainController } from './chain.controller';
import { LedgerService } from './ledger.service';
import { OwnershipService } from './ownership.service';

@Global() // State host and collaborators are shared by every engine
@Module({
  imports: [ConfigModule],
  controllers: [ChainController],
  providers: [ChainStateService, ChainClockService, AccessControlService, OwnershipService, LedgerService],
  exports: [ChainStateService, ChainClockService, AccessControlService, OwnershipService, LedgerService],
})
export class ChainModule {}
