import { Body, Controller, ForbiddenException, Get, Logger, Param, Post } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Caller } from '../../common/decorators/caller.decorator';
import { parseAccount } from '../../common/utils/accounts';
import { toWei } from '../../common/utils/amounts';
import { AccessControlService } from './access-control.service';
import { ChainClockService } from './chain-clock.service';
import { AdvanceClockDto } from './dto/advance-clock.dto';
import { FundAccountDto } from './dto/fund-account.dto';
import { LedgerService } from './ledger.service';

@Controller('chain')
export class ChainController {
  private readonly logger = new Logger(ChainController.name);

  constructor(
    private readonly ledgerService: LedgerService,
    private readonly clock: ChainClockService,
    private readonly accessControl: AccessControlService,
    private readonly configService: ConfigService,
  ) {}

  @Get('time')
  getTime(): { now: number } {
    return { now: this.clock.now() };
  }

  @Post('time/advance')
  advanceTime(@Caller() caller: string, @Body() dto: AdvanceClockDto): { now: number } {
    this.logger.log(`POST /chain/time/advance called by ${caller} (+${dto.seconds}s)`);
    if (this.configService.get<string>('NODE_ENV') === 'production') {
      throw new ForbiddenException('Clock control is disabled in production');
    }
    this.accessControl.requirePrivileged(caller);
    return { now: this.clock.advance(dto.seconds) };
  }

  @Get('custody')
  getCustody(): { amount: string } {
    return { amount: this.ledgerService.custodyBalance().toString() };
  }

  @Get('accounts/:address/balance')
  getBalance(@Param('address') address: string): { account: string; amount: string } {
    const account = parseAccount(address);
    return { account, amount: this.ledgerService.balanceOf(account).toString() };
  }

  @Post('accounts/:address/fund')
  fund(
    @Caller() caller: string,
    @Param('address') address: string,
    @Body() dto: FundAccountDto,
  ): { account: string; amount: string } {
    const account = parseAccount(address);
    this.logger.log(`POST /chain/accounts/${account}/fund called by ${caller}`);
    const balance = this.ledgerService.fund(caller, account, toWei(dto.amount));
    return { account, amount: balance.toString() };
  }
}
