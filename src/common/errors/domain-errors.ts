import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  HttpException,
  HttpStatus,
  NotFoundException,
} from '@nestjs/common';

export type AuthorizationReason = 'NOT_AUTHORIZED' | 'NOT_OWNER' | 'NOT_PRIVILEGED' | 'NOT_RENTER';

export type InvalidArgumentReason =
  | 'INVALID_PRICE'
  | 'INVALID_AMOUNT'
  | 'INVALID_MONTHS'
  | 'INVALID_DURATION'
  | 'INVALID_AREA'
  | 'INVALID_ACCOUNT';

export type StateConflictReason =
  | 'RENTED'
  | 'FOR_SALE'
  | 'NOT_FOR_SALE'
  | 'AUCTION_EXISTS'
  | 'AUCTION_CLOSED'
  | 'TOO_EARLY'
  | 'ALREADY_ENDED';

export type InsufficientPaymentReason = 'UNDERPAID' | 'BID_TOO_LOW' | 'INSUFFICIENT_FUNDS';

export type NotFoundReason = 'PROPERTY_NOT_FOUND' | 'OFFER_NOT_FOUND' | 'RENTAL_NOT_LISTED' | 'AUCTION_NOT_FOUND';

export type DomainErrorReason =
  | AuthorizationReason
  | InvalidArgumentReason
  | StateConflictReason
  | InsufficientPaymentReason
  | NotFoundReason;

// Response body shared by every domain error so clients can branch on `reason`.
function body(reason: DomainErrorReason, message: string, statusCode: number) {
  return { statusCode, reason, message };
}

export class AuthorizationError extends ForbiddenException {
  constructor(public readonly reason: AuthorizationReason, message = 'Not authorized') {
    super(body(reason, message, HttpStatus.FORBIDDEN));
  }
}

export class InvalidArgumentError extends BadRequestException {
  constructor(public readonly reason: InvalidArgumentReason, message: string) {
    super(body(reason, message, HttpStatus.BAD_REQUEST));
  }
}

export class StateConflictError extends ConflictException {
  constructor(public readonly reason: StateConflictReason, message: string) {
    super(body(reason, message, HttpStatus.CONFLICT));
  }
}

export class InsufficientPaymentError extends HttpException {
  constructor(public readonly reason: InsufficientPaymentReason, message: string) {
    super(body(reason, message, HttpStatus.PAYMENT_REQUIRED), HttpStatus.PAYMENT_REQUIRED);
  }
}

export class NotFoundError extends NotFoundException {
  constructor(public readonly reason: NotFoundReason, message: string) {
    super(body(reason, message, HttpStatus.NOT_FOUND));
  }
}
