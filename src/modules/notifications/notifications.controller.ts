import { Controller, Get, Logger, Query } from '@nestjs/common';
import { JsonView, toJsonView } from '../../common/utils/serialization';
import { NotificationQueryDto } from './dto/notification-query.dto';
import { NotificationsService } from './notifications.service';

@Controller('notifications')
export class NotificationsController {
  private readonly logger = new Logger(NotificationsController.name);

  constructor(private readonly notificationsService: NotificationsService) {}

  @Get()
  list(@Query() query: NotificationQueryDto): JsonView[] {
    this.logger.log(`GET /notifications called (after=${query.after ?? 0})`);
    return this.notificationsService.list(query).map(entry => toJsonView(entry));
  }
}
