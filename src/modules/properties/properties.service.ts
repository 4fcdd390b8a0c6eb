import { Injectable, Logger } from '@nestjs/common';
import { InvalidArgumentError, NotFoundError } from '../../common/errors/domain-errors';
import { AccessControlService } from '../chain/access-control.service';
import { ChainClockService } from '../chain/chain-clock.service';
import { ChainStateService } from '../chain/chain-state.service';
import { OwnershipService } from '../chain/ownership.service';
import { Account, PropertyRecord } from '../chain/world-state';
import { NotificationsService } from '../notifications/notifications.service';

export interface MintPropertyInput {
  to: Account;
  location: string;
  area: number;
  category: string;
}

/** Per-property record store shared by the sale, rental and auction engines. */
@Injectable()
export class PropertiesService {
  private readonly logger = new Logger(PropertiesService.name);

  constructor(
    private chainState: ChainStateService,
    private ownership: OwnershipService,
    private accessControl: AccessControlService,
    private clock: ChainClockService,
    private notifications: NotificationsService,
  ) {}

  mint(caller: Account, input: MintPropertyInput): number {
    return this.chainState.transact('mint', () => {
      this.accessControl.requirePrivileged(caller);
      if (!Number.isInteger(input.area) || input.area < 0) {
        throw new InvalidArgumentError('INVALID_AREA', 'Area must be a non-negative integer');
      }

      let propertyId = 0;
      this.chainState.write(world => {
        propertyId = world.nextPropertyId;
        world.nextPropertyId += 1;
        world.properties.set(propertyId, {
          location: input.location,
          area: input.area,
          category: input.category,
          salePrice: 0n,
          forSale: false,
          renter: null,
          rentalEnd: 0,
          monthlyRent: 0n,
        });
      });
      this.ownership.mint(input.to, propertyId);
      this.notifications.emit({ kind: 'Minted', propertyId, owner: input.to, location: input.location });

      this.logger.log(`Minted property ${propertyId} (${input.category}, ${input.location}) to ${input.to}`);
      return propertyId;
    });
  }

  getDetails(propertyId: number): PropertyRecord {
    const record = this.chainState.read(world => world.properties.get(propertyId));
    if (!record) {
      throw new NotFoundError('PROPERTY_NOT_FOUND', `Property ${propertyId} does not exist`);
    }
    return { ...record };
  }

  // Derived on every read; nothing clears renter or rentalEnd when a term lapses.
  isRented(propertyId: number): boolean {
    const { renter, rentalEnd } = this.getDetails(propertyId);
    return renter !== null && this.clock.now() <= rentalEnd;
  }

  ownerOf(propertyId: number): Account {
    return this.ownership.ownerOf(propertyId);
  }

  update(propertyId: number, patch: Partial<PropertyRecord>): void {
    this.getDetails(propertyId);
    this.chainState.write(world => {
      const record = world.properties.get(propertyId);
      if (record) {
        world.properties.set(propertyId, { ...record, ...patch });
      }
    });
  }
}
