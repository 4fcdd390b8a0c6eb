import { Body, Controller, HttpCode, Logger, Param, ParseIntPipe, Post } from '@nestjs/common';
import { AttachedValue, Caller } from '../../common/decorators/caller.decorator';
import { toWei } from '../../common/utils/amounts';
import { ExtendRentalDto, ListForRentDto, RentPropertyDto } from './dto/rent.dto';
import { RentService } from './rent.service';

@Controller('rent')
export class RentController {
  private readonly logger = new Logger(RentController.name);

  constructor(private readonly rentService: RentService) {}

  @Post(':id/listing')
  @HttpCode(204)
  listForRent(
    @Caller() caller: string,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: ListForRentDto,
  ): void {
    this.logger.log(`POST /rent/${id}/listing called by ${caller}`);
    this.rentService.listForRent(caller, id, toWei(dto.monthlyRent));
  }

  @Post(':id/lease')
  rentProperty(
    @Caller() caller: string,
    @AttachedValue() value: bigint,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: RentPropertyDto,
  ): { propertyId: number; renter: string; rentalEnd: number } {
    this.logger.log(`POST /rent/${id}/lease called by ${caller}`);
    const rentalEnd = this.rentService.rentProperty(caller, id, dto.months, value);
    return { propertyId: id, renter: caller, rentalEnd };
  }

  @Post(':id/lease/extend')
  extendRental(
    @Caller() caller: string,
    @AttachedValue() value: bigint,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: ExtendRentalDto,
  ): { propertyId: number; renter: string; rentalEnd: number } {
    this.logger.log(`POST /rent/${id}/lease/extend called by ${caller}`);
    const rentalEnd = this.rentService.extendRental(caller, id, dto.additionalMonths, value);
    return { propertyId: id, renter: caller, rentalEnd };
  }
}
