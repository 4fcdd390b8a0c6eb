import { Body, Controller, Get, Logger, Param, ParseIntPipe, Put } from '@nestjs/common';
import { Caller } from '../../common/decorators/caller.decorator';
import { parseAccount } from '../../common/utils/accounts';
import { SetManagerDto } from './dto/set-manager.dto';
import { ManagersService } from './managers.service';

@Controller('properties/:id/manager')
export class ManagersController {
  private readonly logger = new Logger(ManagersController.name);

  constructor(private readonly managersService: ManagersService) {}

  @Get()
  getManager(@Param('id', ParseIntPipe) id: number): { propertyId: number; manager: string | null } {
    this.logger.log(`GET /properties/${id}/manager called`);
    return { propertyId: id, manager: this.managersService.managerOf(id) };
  }

  @Put()
  setManager(
    @Caller() caller: string,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: SetManagerDto,
  ): { propertyId: number; manager: string | null } {
    this.logger.log(`PUT /properties/${id}/manager called by ${caller}`);
    const manager = dto.manager === null ? null : parseAccount(dto.manager);
    this.managersService.setManager(caller, id, manager);
    return { propertyId: id, manager };
  }
}
