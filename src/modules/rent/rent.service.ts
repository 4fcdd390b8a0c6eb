import { Injectable, Logger } from '@nestjs/common';
import {
  AuthorizationError,
  InsufficientPaymentError,
  InvalidArgumentError,
  NotFoundError,
  StateConflictError,
} from '../../common/errors/domain-errors';
import { formatAmount, SECONDS_PER_MONTH } from '../../common/utils/amounts';
import { ChainClockService } from '../chain/chain-clock.service';
import { ChainStateService } from '../chain/chain-state.service';
import { LedgerService } from '../chain/ledger.service';
import { OwnershipService } from '../chain/ownership.service';
import { Account } from '../chain/world-state';
import { ManagersService } from '../managers/managers.service';
import { NotificationsService } from '../notifications/notifications.service';
import { PropertiesService } from '../properties/properties.service';

function requireWholeMonths(months: number): void {
  if (!Number.isInteger(months) || months <= 0) {
    throw new InvalidArgumentError('INVALID_MONTHS', 'Months must be a positive whole number');
  }
}

/** End of a term `months` long starting at `from`; rejected once it leaves the safe integer range. */
function termEnd(from: number, months: number): number {
  const end = from + months * SECONDS_PER_MONTH;
  if (!Number.isSafeInteger(end)) {
    throw new InvalidArgumentError('INVALID_MONTHS', `A term of ${months} month(s) ends too far in the future`);
  }
  return end;
}

@Injectable()
export class RentService {
  private readonly logger = new Logger(RentService.name);

  constructor(
    private chainState: ChainStateService,
    private properties: PropertiesService,
    private managers: ManagersService,
    private ownership: OwnershipService,
    private ledger: LedgerService,
    private clock: ChainClockService,
    private notifications: NotificationsService,
  ) {}

  listForRent(caller: Account, propertyId: number, monthlyRent: bigint): void {
    this.chainState.transact('listForRent', () => {
      this.managers.requireAuthorized(propertyId, caller);
      if (this.properties.getDetails(propertyId).forSale) {
        throw new StateConflictError('FOR_SALE', `Property ${propertyId} is listed for sale`);
      }
      if (this.properties.isRented(propertyId)) {
        throw new StateConflictError('RENTED', `Property ${propertyId} is currently rented`);
      }
      if (monthlyRent < 0n) {
        throw new InvalidArgumentError('INVALID_PRICE', 'Monthly rent cannot be negative');
      }

      this.properties.update(propertyId, { monthlyRent });
      this.notifications.emit({ kind: 'ListedForRent', propertyId, monthlyRent });
      this.logger.log(`Property ${propertyId} listed for rent at ${formatAmount(monthlyRent)}/month by ${caller}`);
    });
  }

  /**
   * Rents the property for whole 30-day months, paying the title holder up front.
   * Anything attached above the total stays in custody. The sale listing is not
   * consulted, so a listed property can be rented.
   */
  rentProperty(caller: Account, propertyId: number, months: number, value: bigint): number {
    return this.chainState.transact('rentProperty', () => {
      const { monthlyRent } = this.properties.getDetails(propertyId);
      if (monthlyRent === 0n) {
        throw new NotFoundError('RENTAL_NOT_LISTED', `Property ${propertyId} is not listed for rent`);
      }
      requireWholeMonths(months);
      const rentalEnd = termEnd(this.clock.now(), months);
      if (this.properties.isRented(propertyId)) {
        throw new StateConflictError('RENTED', `Property ${propertyId} is currently rented`);
      }
      const totalPaid = monthlyRent * BigInt(months);
      if (value < totalPaid) {
        throw new InsufficientPaymentError(
          'UNDERPAID',
          `Renting for ${months} month(s) costs ${formatAmount(totalPaid)}, got ${formatAmount(value)}`,
        );
      }

      const landlord = this.ownership.ownerOf(propertyId);
      this.ledger.collect(caller, value);
      this.properties.update(propertyId, { renter: caller, rentalEnd });
      this.notifications.emit({ kind: 'Rented', propertyId, renter: caller, months, totalPaid, landlord });
      this.ledger.pay(landlord, totalPaid);

      this.logger.log(`Property ${propertyId} rented by ${caller} for ${months} month(s) until ${rentalEnd}`);
      return rentalEnd;
    });
  }

  // Rent goes to whoever holds title now, which may not be the original landlord.
  extendRental(caller: Account, propertyId: number, additionalMonths: number, value: bigint): number {
    return this.chainState.transact('extendRental', () => {
      const { renter, monthlyRent, rentalEnd } = this.properties.getDetails(propertyId);
      if (renter === null || renter !== caller) {
        throw new AuthorizationError('NOT_RENTER', 'Only the current renter can extend the rental');
      }
      requireWholeMonths(additionalMonths);
      const extendedEnd = termEnd(rentalEnd, additionalMonths);
      const additionalPaid = monthlyRent * BigInt(additionalMonths);
      if (value < additionalPaid) {
        throw new InsufficientPaymentError(
          'UNDERPAID',
          `Extending by ${additionalMonths} month(s) costs ${formatAmount(additionalPaid)}, got ${formatAmount(value)}`,
        );
      }

      const landlord = this.ownership.ownerOf(propertyId);
      this.ledger.collect(caller, value);
      this.properties.update(propertyId, { rentalEnd: extendedEnd });
      this.notifications.emit({
        kind: 'Extended',
        propertyId,
        renter: caller,
        additionalMonths,
        additionalPaid,
        landlord,
      });
      this.ledger.pay(landlord, additionalPaid);

      this.logger.log(`Rental of property ${propertyId} extended by ${additionalMonths} month(s) to ${extendedEnd}`);
      return extendedEnd;
    });
  }
}
