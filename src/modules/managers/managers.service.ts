import { Injectable, Logger } from '@nestjs/common';
import { AuthorizationError } from '../../common/errors/domain-errors';
import { ChainStateService } from '../chain/chain-state.service';
import { OwnershipService } from '../chain/ownership.service';
import { Account } from '../chain/world-state';
import { NotificationsService } from '../notifications/notifications.service';

@Injectable()
export class ManagersService {
  private readonly logger = new Logger(ManagersService.name);

  constructor(
    private chainState: ChainStateService,
    private ownership: OwnershipService,
    private notifications: NotificationsService,
  ) {}

  managerOf(propertyId: number): Account | null {
    this.ownership.ownerOf(propertyId);
    return this.chainState.read(world => world.managers.get(propertyId) ?? null);
  }

  /** Title holder or the property's current manager. */
  isAuthorized(propertyId: number, caller: Account): boolean {
    return this.ownership.ownerOf(propertyId) === caller || this.managerOf(propertyId) === caller;
  }

  requireAuthorized(propertyId: number, caller: Account): void {
    if (!this.isAuthorized(propertyId, caller)) {
      throw new AuthorizationError('NOT_AUTHORIZED', `Caller is not authorized for property ${propertyId}`);
    }
  }

  /**
   * Appoints (or, with `null`, clears) the property's manager. Only the title
   * holder may do this; a manager cannot appoint another manager.
   */
  setManager(caller: Account, propertyId: number, manager: Account | null): void {
    this.chainState.transact('setManager', () => {
      if (this.ownership.ownerOf(propertyId) !== caller) {
        throw new AuthorizationError('NOT_OWNER', 'Only the title holder can appoint a manager');
      }
      this.chainState.write(world => {
        if (manager === null) {
          world.managers.delete(propertyId);
        } else {
          world.managers.set(propertyId, manager);
        }
      });
      this.notifications.emit({ kind: 'ManagerChanged', propertyId, manager });
      this.logger.log(`Property ${propertyId} manager set to ${manager ?? 'none'} by ${caller}`);
    });
  }
}
