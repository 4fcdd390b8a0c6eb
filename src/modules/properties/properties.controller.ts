import { Body, Controller, Get, Logger, Param, ParseIntPipe, Post } from '@nestjs/common';
import { Caller } from '../../common/decorators/caller.decorator';
import { parseAccount } from '../../common/utils/accounts';
import { JsonView, toJsonView } from '../../common/utils/serialization';
import { MintPropertyDto } from './dto/property.dto';
import { PropertiesService } from './properties.service';

@Controller('properties')
export class PropertiesController {
  private readonly logger = new Logger(PropertiesController.name);

  constructor(private readonly propertiesService: PropertiesService) {}

  @Post()
  mint(@Caller() caller: string, @Body() dto: MintPropertyDto): { propertyId: number; owner: string } {
    this.logger.log(`POST /properties called by ${caller}`);
    const owner = parseAccount(dto.to);
    const propertyId = this.propertiesService.mint(caller, {
      to: owner,
      location: dto.location,
      area: dto.area,
      category: dto.category,
    });
    return { propertyId, owner };
  }

  @Get(':id')
  findOne(@Param('id', ParseIntPipe) id: number): JsonView {
    this.logger.log(`GET /properties/${id} called`);
    return {
      propertyId: id,
      owner: this.propertiesService.ownerOf(id),
      ...toJsonView(this.propertiesService.getDetails(id)),
      rented: this.propertiesService.isRented(id),
    };
  }

  @Get(':id/rented')
  isRented(@Param('id', ParseIntPipe) id: number): { propertyId: number; rented: boolean } {
    this.logger.log(`GET /properties/${id}/rented called`);
    return { propertyId: id, rented: this.propertiesService.isRented(id) };
  }
}
