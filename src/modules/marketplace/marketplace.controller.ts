import { Body, Controller, Delete, Get, HttpCode, Logger, Param, ParseIntPipe, Post } from '@nestjs/common';
import { AttachedValue, Caller } from '../../common/decorators/caller.decorator';
import { parseAccount } from '../../common/utils/accounts';
import { toWei } from '../../common/utils/amounts';
import { JsonView, toJsonView } from '../../common/utils/serialization';
import { ListForSaleDto } from './dto/listing.dto';
import { MarketplaceService } from './marketplace.service';

@Controller('marketplace')
export class MarketplaceController {
  private readonly logger = new Logger(MarketplaceController.name);

  constructor(private readonly marketplaceService: MarketplaceService) {}

  @Post(':id/listing')
  @HttpCode(204)
  listForSale(
    @Caller() caller: string,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: ListForSaleDto,
  ): void {
    this.logger.log(`POST /marketplace/${id}/listing called by ${caller}`);
    this.marketplaceService.listForSale(caller, id, toWei(dto.price));
  }

  @Get(':id/offers')
  findOffers(@Param('id', ParseIntPipe) id: number): JsonView[] {
    this.logger.log(`GET /marketplace/${id}/offers called`);
    return this.marketplaceService.offersFor(id).map(offer => toJsonView(offer));
  }

  @Get(':id/offers/:bidder')
  findOffer(@Param('id', ParseIntPipe) id: number, @Param('bidder') bidder: string): JsonView {
    const account = parseAccount(bidder);
    return toJsonView({ bidder: account, amount: this.marketplaceService.offerOf(id, account) });
  }

  @Post(':id/offers')
  @HttpCode(204)
  makeOffer(
    @Caller() caller: string,
    @AttachedValue() value: bigint,
    @Param('id', ParseIntPipe) id: number,
  ): void {
    this.logger.log(`POST /marketplace/${id}/offers called by ${caller}`);
    this.marketplaceService.makeOffer(caller, id, value);
  }

  @Post(':id/offers/:buyer/accept')
  @HttpCode(204)
  acceptOffer(
    @Caller() caller: string,
    @Param('id', ParseIntPipe) id: number,
    @Param('buyer') buyer: string,
  ): void {
    this.logger.log(`POST /marketplace/${id}/offers/${buyer}/accept called by ${caller}`);
    this.marketplaceService.acceptOffer(caller, id, parseAccount(buyer));
  }

  @Delete(':id/offers')
  withdrawOffer(@Caller() caller: string, @Param('id', ParseIntPipe) id: number): JsonView {
    this.logger.log(`DELETE /marketplace/${id}/offers called by ${caller}`);
    const amount = this.marketplaceService.withdrawOffer(caller, id);
    return toJsonView({ bidder: caller, amount });
  }
}
