import { Module } from '@nestjs/common';
import { ManagersModule } from '../managers/managers.module';
import { NotificationsModule } from '../notifications/notifications.module';
import { PropertiesModule } from '../properties/properties.module';
import { RentController } from './rent.controller';
import { RentService } from './rent.service';

@Module({
  imports: [PropertiesModule, ManagersModule, NotificationsModule],
  controllers: [RentController],
  providers: [RentService],
  exports: [RentService],
})
export class RentModule {}
