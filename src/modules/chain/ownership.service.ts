import { Injectable, Logger } from '@nestjs/common';
import { NotFoundError } from '../../common/errors/domain-errors';
import { ChainStateService } from './chain-state.service';
import { Account } from './world-state';

// Title ledger for property ids (non-fungible: one holder per id).
@Injectable()
export class OwnershipService {
  private readonly logger = new Logger(OwnershipService.name);

  constructor(private chainState: ChainStateService) {}

  ownerOf(propertyId: number): Account {
    const owner = this.chainState.read(world => world.titles.get(propertyId));
    if (owner === undefined) {
      throw new NotFoundError('PROPERTY_NOT_FOUND', `Property ${propertyId} does not exist`);
    }
    return owner;
  }

  balanceOf(owner: Account): number {
    return this.chainState.read(world => {
      let count = 0;
      for (const holder of world.titles.values()) {
        if (holder === owner) count++;
      }
      return count;
    });
  }

  mint(to: Account, propertyId: number): void {
    this.chainState.write(world => {
      if (world.titles.has(propertyId)) {
        throw new Error(`Title for property ${propertyId} already exists`);
      }
      world.titles.set(propertyId, to);
    });
    this.logger.log(`Title for property ${propertyId} minted to ${to}`);
  }

  transfer(from: Account, to: Account, propertyId: number): void {
    this.chainState.write(world => {
      const holder = world.titles.get(propertyId);
      if (holder !== from) {
        throw new Error(`Title transfer of property ${propertyId} from ${from} but holder is ${holder ?? 'nobody'}`);
      }
      world.titles.set(propertyId, to);
    });
    this.logger.log(`Title for property ${propertyId} transferred ${from} -> ${to}`);
  }
}
