import { Body, Controller, Get, HttpCode, Logger, Param, ParseIntPipe, Post } from '@nestjs/common';
import { AttachedValue, Caller } from '../../common/decorators/caller.decorator';
import { toWei } from '../../common/utils/amounts';
import { JsonView, toJsonView } from '../../common/utils/serialization';
import { AuctionService } from './auction.service';
import { StartAuctionDto } from './dto/start-auction.dto';

@Controller('auctions')
export class AuctionController {
  private readonly logger = new Logger(AuctionController.name);

  constructor(private readonly auctionService: AuctionService) {}

  @Get(':id')
  findOne(@Param('id', ParseIntPipe) id: number): JsonView {
    this.logger.log(`GET /auctions/${id} called`);
    return { propertyId: id, ...toJsonView(this.auctionService.getAuction(id)) };
  }

  @Post(':id')
  start(
    @Caller() caller: string,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: StartAuctionDto,
  ): { propertyId: number; endTime: number } {
    this.logger.log(`POST /auctions/${id} called by ${caller}`);
    const endTime = this.auctionService.startAuction(caller, id, toWei(dto.startPrice), dto.duration);
    return { propertyId: id, endTime };
  }

  @Post(':id/bids')
  @HttpCode(204)
  bid(
    @Caller() caller: string,
    @AttachedValue() value: bigint,
    @Param('id', ParseIntPipe) id: number,
  ): void {
    this.logger.log(`POST /auctions/${id}/bids called by ${caller}`);
    this.auctionService.bid(caller, id, value);
  }

  @Post(':id/end')
  end(@Param('id', ParseIntPipe) id: number): JsonView {
    this.logger.log(`POST /auctions/${id}/end called`);
    return { propertyId: id, ...toJsonView(this.auctionService.endAuction(id)) };
  }
}
