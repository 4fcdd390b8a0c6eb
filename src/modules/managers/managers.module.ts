import { Module } from '@nestjs/common';
import { NotificationsModule } from '../notifications/notifications.module';
import { ManagersController } from './managers.controller';
import { ManagersService } from './managers.service';

@Module({
  imports: [NotificationsModule],
  controllers: [ManagersController],
  providers: [ManagersService],
  exports: [ManagersService],
})
export class ManagersModule {}
