import { Injectable, Logger } from '@nestjs/common';
import { InvalidArgumentError, NotFoundError, StateConflictError } from '../../common/errors/domain-errors';
import { formatAmount } from '../../common/utils/amounts';
import { ChainStateService } from '../chain/chain-state.service';
import { LedgerService } from '../chain/ledger.service';
import { OwnershipService } from '../chain/ownership.service';
import { Account } from '../chain/world-state';
import { ManagersService } from '../managers/managers.service';
import { NotificationsService } from '../notifications/notifications.service';
import { PropertiesService } from '../properties/properties.service';

export interface OfferView {
  bidder: Account;
  amount: bigint;
}

@Injectable()
export class MarketplaceService {
  private readonly logger = new Logger(MarketplaceService.name);

  constructor(
    private chainState: ChainStateService,
    private properties: PropertiesService,
    private managers: ManagersService,
    private ownership: OwnershipService,
    private ledger: LedgerService,
    private notifications: NotificationsService,
  ) {}

  listForSale(caller: Account, propertyId: number, price: bigint): void {
    this.chainState.transact('listForSale', () => {
      // Rental state is checked first: a rented property is unlistable for anyone.
      if (this.properties.isRented(propertyId)) {
        throw new StateConflictError('RENTED', `Property ${propertyId} is currently rented`);
      }
      if (price <= 0n) {
        throw new InvalidArgumentError('INVALID_PRICE', 'Sale price must be positive');
      }
      this.managers.requireAuthorized(propertyId, caller);

      this.properties.update(propertyId, { forSale: true, salePrice: price });
      this.notifications.emit({ kind: 'Listed', propertyId, price });
      this.logger.log(`Property ${propertyId} listed for sale at ${formatAmount(price)} by ${caller}`);
    });
  }

  /**
   * Escrows `value` as the caller's offer. A repeat offer replaces the earlier
   * one rather than adding to it; the replaced amount stays in custody.
   */
  makeOffer(caller: Account, propertyId: number, value: bigint): void {
    this.chainState.transact('makeOffer', () => {
      if (!this.properties.getDetails(propertyId).forSale) {
        throw new StateConflictError('NOT_FOR_SALE', `Property ${propertyId} is not for sale`);
      }
      if (value <= 0n) {
        throw new InvalidArgumentError('INVALID_AMOUNT', 'Offer must carry a positive value');
      }

      this.ledger.collect(caller, value);
      this.chainState.write(world => {
        const offers = world.offers.get(propertyId) ?? new Map<Account, bigint>();
        offers.set(caller, value);
        world.offers.set(propertyId, offers);
      });
      this.notifications.emit({ kind: 'OfferMade', propertyId, bidder: caller, amount: value });
      this.logger.log(`Offer of ${formatAmount(value)} on property ${propertyId} from ${caller}`);
    });
  }

  acceptOffer(caller: Account, propertyId: number, buyer: Account): void {
    this.chainState.transact('acceptOffer', () => {
      this.managers.requireAuthorized(propertyId, caller);
      if (!this.properties.getDetails(propertyId).forSale) {
        throw new StateConflictError('NOT_FOR_SALE', `Property ${propertyId} is not for sale`);
      }
      const amount = this.offerOf(propertyId, buyer);
      if (amount === 0n) {
        throw new NotFoundError('OFFER_NOT_FOUND', `No open offer from ${buyer} on property ${propertyId}`);
      }

      const seller = this.ownership.ownerOf(propertyId);
      this.properties.update(propertyId, { forSale: false, salePrice: 0n });
      this.clearOffer(propertyId, buyer);
      this.ownership.transfer(seller, buyer, propertyId);
      this.notifications.emit({ kind: 'OfferAccepted', propertyId, buyer, amount, seller });
      this.ledger.pay(seller, amount);

      this.logger.log(`Property ${propertyId} sold by ${seller} to ${buyer} for ${formatAmount(amount)}`);
    });
  }

  withdrawOffer(caller: Account, propertyId: number): bigint {
    return this.chainState.transact('withdrawOffer', () => {
      const amount = this.offerOf(propertyId, caller);
      if (amount === 0n) {
        throw new NotFoundError('OFFER_NOT_FOUND', `No open offer from ${caller} on property ${propertyId}`);
      }

      this.clearOffer(propertyId, caller);
      this.notifications.emit({ kind: 'OfferWithdrawn', propertyId, bidder: caller, amount });
      this.ledger.pay(caller, amount);

      this.logger.log(`Offer of ${formatAmount(amount)} on property ${propertyId} withdrawn by ${caller}`);
      return amount;
    });
  }

  offerOf(propertyId: number, bidder: Account): bigint {
    return this.chainState.read(world => world.offers.get(propertyId)?.get(bidder) ?? 0n);
  }

  offersFor(propertyId: number): OfferView[] {
    this.properties.getDetails(propertyId);
    return this.chainState.read(world => {
      const offers = world.offers.get(propertyId);
      return offers ? Array.from(offers, ([bidder, amount]) => ({ bidder, amount })) : [];
    });
  }

  private clearOffer(propertyId: number, bidder: Account): void {
    this.chainState.write(world => {
      world.offers.get(propertyId)?.delete(bidder);
    });
  }
}
