import { Injectable, Logger } from '@nestjs/common';
import { ChainClockService } from '../chain/chain-clock.service';
import { ChainStateService } from '../chain/chain-state.service';
import { CommitListener, Notification, NotificationPayload } from './notification.types';

export interface NotificationQuery {
  after?: number;
  propertyId?: number;
  limit?: number;
}

/**
 * Append-only channel of state transitions. Entries are written inside the
 * operation that caused them and vanish with it if it aborts; subscribers only
 * ever see committed entries, in sequence order.
 */
@Injectable()
export class NotificationsService {
  private readonly logger = new Logger(NotificationsService.name);

  constructor(
    private chainState: ChainStateService,
    private clock: ChainClockService,
  ) {}

  emit(payload: NotificationPayload): Notification {
    const sequence = this.chainState.read(world => world.notifications.length) + 1;
    const notification: Notification = { ...payload, sequence, timestamp: this.clock.now() };
    this.chainState.append(notification);
    this.logger.debug(`#${sequence} ${payload.kind} for property ${payload.propertyId}`);
    return notification;
  }

  list(query: NotificationQuery = {}): Notification[] {
    const { after = 0, propertyId, limit } = query;
    const matches = this.chainState.read(world =>
      world.notifications.filter(
        entry => entry.sequence > after && (propertyId === undefined || entry.propertyId === propertyId),
      ),
    );
    return limit === undefined ? matches : matches.slice(0, limit);
  }

  subscribe(listener: CommitListener): () => void {
    return this.chainState.onCommit(listener);
  }
}
