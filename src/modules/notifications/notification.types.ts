import type { Account } from '../chain/world-state';

export type NotificationPayload =
  | { kind: 'Minted'; propertyId: number; owner: Account; location: string }
  | { kind: 'Listed'; propertyId: number; price: bigint }
  | { kind: 'ListedForRent'; propertyId: number; monthlyRent: bigint }
  | { kind: 'OfferMade'; propertyId: number; bidder: Account; amount: bigint }
  | { kind: 'OfferAccepted'; propertyId: number; buyer: Account; amount: bigint; seller: Account }
  | { kind: 'OfferWithdrawn'; propertyId: number; bidder: Account; amount: bigint }
  | { kind: 'Rented'; propertyId: number; renter: Account; months: number; totalPaid: bigint; landlord: Account }
  | {
      kind: 'Extended';
      propertyId: number;
      renter: Account;
      additionalMonths: number;
      additionalPaid: bigint;
      landlord: Account;
    }
  | { kind: 'AuctionStarted'; propertyId: number; startPrice: bigint; endTime: number }
  | { kind: 'Bid'; propertyId: number; bidder: Account; amount: bigint }
  | { kind: 'AuctionEnded'; propertyId: number; winner: Account | null; amount: bigint; seller: Account }
  | { kind: 'ManagerChanged'; propertyId: number; manager: Account | null };

export type NotificationKind = NotificationPayload['kind'];

export type Notification = NotificationPayload & {
  sequence: number;
  timestamp: number;
};

export type NotificationOf<K extends NotificationKind> = Extract<Notification, { kind: K }>;

export type CommitListener = (committed: readonly Notification[]) => void;
