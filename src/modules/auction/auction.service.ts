import { Injectable, Logger } from '@nestjs/common';
import {
  InsufficientPaymentError,
  InvalidArgumentError,
  NotFoundError,
  StateConflictError,
} from '../../common/errors/domain-errors';
import { formatAmount } from '../../common/utils/amounts';
import { ChainClockService } from '../chain/chain-clock.service';
import { ChainStateService } from '../chain/chain-state.service';
import { LedgerService } from '../chain/ledger.service';
import { OwnershipService } from '../chain/ownership.service';
import { Account, AuctionState } from '../chain/world-state';
import { ManagersService } from '../managers/managers.service';
import { NotificationsService } from '../notifications/notifications.service';
import { PropertiesService } from '../properties/properties.service';

export interface AuctionResult {
  winner: Account | null;
  amount: bigint;
}

/**
 * Timed English auction, one per property. Open from `startAuction` until
 * `endTime`; `endAuction` closes it for good. A closed auction is kept and
 * blocks a second auction on the same property.
 */
@Injectable()
export class AuctionService {
  private readonly logger = new Logger(AuctionService.name);

  constructor(
    private chainState: ChainStateService,
    private properties: PropertiesService,
    private managers: ManagersService,
    private ownership: OwnershipService,
    private ledger: LedgerService,
    private clock: ChainClockService,
    private notifications: NotificationsService,
  ) {}

  getAuction(propertyId: number): AuctionState {
    const auction = this.chainState.read(world => world.auctions.get(propertyId));
    if (!auction) {
      throw new NotFoundError('AUCTION_NOT_FOUND', `No auction for property ${propertyId}`);
    }
    return { ...auction };
  }

  startAuction(caller: Account, propertyId: number, startPrice: bigint, duration: number): number {
    return this.chainState.transact('startAuction', () => {
      this.managers.requireAuthorized(propertyId, caller);
      if (this.properties.getDetails(propertyId).forSale) {
        throw new StateConflictError('FOR_SALE', `Property ${propertyId} is listed for sale`);
      }
      if (this.properties.isRented(propertyId)) {
        throw new StateConflictError('RENTED', `Property ${propertyId} is currently rented`);
      }
      if (this.chainState.read(world => world.auctions.has(propertyId))) {
        throw new StateConflictError('AUCTION_EXISTS', `Property ${propertyId} already has an auction`);
      }
      if (startPrice < 0n) {
        throw new InvalidArgumentError('INVALID_PRICE', 'Start price cannot be negative');
      }
      if (!Number.isInteger(duration) || duration < 0) {
        throw new InvalidArgumentError('INVALID_DURATION', 'Duration must be a whole number of seconds');
      }

      const endTime = this.clock.now() + duration;
      this.chainState.write(world => {
        world.auctions.set(propertyId, { startPrice, highBid: 0n, highBidder: null, endTime, ended: false });
      });
      this.notifications.emit({ kind: 'AuctionStarted', propertyId, startPrice, endTime });
      this.logger.log(`Auction on property ${propertyId} opened by ${caller}, start ${formatAmount(startPrice)}, ends ${endTime}`);
      return endTime;
    });
  }

  /**
   * Takes `value` as the new high bid. The previous high bidder gets their bid
   * back in full once the new bid is recorded.
   */
  bid(caller: Account, propertyId: number, value: bigint): void {
    this.chainState.transact('bid', () => {
      const auction = this.getAuction(propertyId);
      if (auction.ended || this.clock.now() >= auction.endTime) {
        throw new StateConflictError('AUCTION_CLOSED', `Auction on property ${propertyId} is closed`);
      }
      if (value <= auction.highBid || value < auction.startPrice) {
        throw new InsufficientPaymentError(
          'BID_TOO_LOW',
          `Bid of ${formatAmount(value)} must exceed ${formatAmount(auction.highBid)} and meet ${formatAmount(auction.startPrice)}`,
        );
      }

      const outbid = auction.highBidder;
      const refund = auction.highBid;
      this.ledger.collect(caller, value);
      this.chainState.write(world => {
        world.auctions.set(propertyId, { ...auction, highBid: value, highBidder: caller });
      });
      this.notifications.emit({ kind: 'Bid', propertyId, bidder: caller, amount: value });
      if (outbid !== null) {
        this.ledger.pay(outbid, refund);
      }

      this.logger.log(`Bid of ${formatAmount(value)} on property ${propertyId} from ${caller}`);
    });
  }

  endAuction(propertyId: number): AuctionResult {
    return this.chainState.transact('endAuction', () => {
      const auction = this.getAuction(propertyId);
      if (this.clock.now() < auction.endTime) {
        throw new StateConflictError('TOO_EARLY', `Auction on property ${propertyId} ends at ${auction.endTime}`);
      }
      if (auction.ended) {
        throw new StateConflictError('ALREADY_ENDED', `Auction on property ${propertyId} has already ended`);
      }

      const seller = this.ownership.ownerOf(propertyId);
      this.chainState.write(world => {
        world.auctions.set(propertyId, { ...auction, ended: true });
      });

      const winner = auction.highBidder;
      const amount = winner === null ? 0n : auction.highBid;
      if (winner !== null) {
        this.ownership.transfer(seller, winner, propertyId);
      }
      this.notifications.emit({ kind: 'AuctionEnded', propertyId, winner, amount, seller });
      if (winner !== null) {
        this.ledger.pay(seller, amount);
      }

      this.logger.log(
        winner === null
          ? `Auction on property ${propertyId} ended without bids`
          : `Auction on property ${propertyId} won by ${winner} for ${formatAmount(amount)}`,
      );
      return { winner, amount };
    });
  }
}
