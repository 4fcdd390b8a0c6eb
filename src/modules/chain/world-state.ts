import type { Notification } from '../notifications/notification.types';

/** Checksummed EVM-style address. */
export type Account = string;

export interface PropertyRecord {
  location: string;
  area: number;
  category: string;
  salePrice: bigint;
  forSale: boolean;
  renter: Account | null;
  // Unix seconds; kept after the term lapses, expiry is derived on read.
  rentalEnd: number;
  monthlyRent: bigint;
}

export interface AuctionState {
  startPrice: bigint;
  highBid: bigint;
  highBidder: Account | null;
  endTime: number;
  ended: boolean;
}

export interface WorldState {
  nextPropertyId: number;
  properties: Map<number, PropertyRecord>;
  titles: Map<number, Account>;
  managers: Map<number, Account>;
  offers: Map<number, Map<Account, bigint>>;
  auctions: Map<number, AuctionState>;
  balances: Map<Account, bigint>;
  // Value held by the registry itself: live escrows, live high bids, retained overpayment.
  custody: bigint;
  notifications: Notification[];
}

export function createGenesisState(): WorldState {
  return {
    nextPropertyId: 1,
    properties: new Map(),
    titles: new Map(),
    managers: new Map(),
    offers: new Map(),
    auctions: new Map(),
    balances: new Map(),
    custody: 0n,
    notifications: [],
  };
}
