import { parseEther } from 'ethers';
import { ALICE, BOB, CAROL, createHarness, DAY, GENESIS_TIME, Harness, reasonOf, STARTING_BALANCE } from '../../testing/harness';

describe('AuctionService', () => {
  let h: Harness;
  let propertyId: number;
  const startPrice = parseEther('1');

  beforeEach(async () => {
    h = await createHarness();
    propertyId = h.mintTo(ALICE);
  });

  afterEach(async () => {
    await h.close();
  });

  describe('startAuction', () => {
    it('opens an auction ending after the given duration', () => {
      expect(h.auction.startAuction(ALICE, propertyId, startPrice, 3 * DAY)).toBe(GENESIS_TIME + 3 * DAY);

      expect(h.auction.getAuction(propertyId)).toEqual({
        startPrice,
        highBid: 0n,
        highBidder: null,
        endTime: GENESIS_TIME + 3 * DAY,
        ended: false,
      });
      expect(h.notifications.list({ after: 1 })).toEqual([
        expect.objectContaining({ kind: 'AuctionStarted', propertyId, startPrice, endTime: GENESIS_TIME + 3 * DAY }),
      ]);
    });

    it('rejects strangers, bad terms and a second auction', () => {
      expect(reasonOf(() => h.auction.startAuction(BOB, propertyId, startPrice, DAY))).toBe('NOT_AUTHORIZED');
      expect(reasonOf(() => h.auction.startAuction(ALICE, propertyId, -1n, DAY))).toBe('INVALID_PRICE');
      expect(reasonOf(() => h.auction.startAuction(ALICE, propertyId, startPrice, 1.5))).toBe('INVALID_DURATION');

      h.auction.startAuction(ALICE, propertyId, startPrice, DAY);
      expect(reasonOf(() => h.auction.startAuction(ALICE, propertyId, startPrice, DAY))).toBe('AUCTION_EXISTS');
    });

    it('refuses properties listed for sale or rented', () => {
      const listed = h.mintTo(ALICE);
      h.marketplace.listForSale(ALICE, listed, startPrice);
      expect(reasonOf(() => h.auction.startAuction(ALICE, listed, startPrice, DAY))).toBe('FOR_SALE');

      const rented = h.mintTo(ALICE);
      h.rent.listForRent(ALICE, rented, 1n);
      h.rent.rentProperty(BOB, rented, 1, 1n);
      expect(reasonOf(() => h.auction.startAuction(ALICE, rented, startPrice, DAY))).toBe('RENTED');
    });
  });

  describe('bidding', () => {
    beforeEach(() => {
      h.auction.startAuction(ALICE, propertyId, startPrice, 3 * DAY);
    });

    it('requires each bid to beat the high bid and meet the start price', () => {
      expect(reasonOf(() => h.auction.bid(BOB, propertyId, startPrice - 1n))).toBe('BID_TOO_LOW');

      h.auction.bid(BOB, propertyId, startPrice + 1n);
      expect(reasonOf(() => h.auction.bid(CAROL, propertyId, startPrice + 1n))).toBe('BID_TOO_LOW');

      expect(h.auction.getAuction(propertyId)).toMatchObject({ highBid: startPrice + 1n, highBidder: BOB });
      expect(h.ledger.balanceOf(CAROL)).toBe(STARTING_BALANCE);
    });

    it('refunds the outbid bidder after recording the new high bid', () => {
      h.auction.bid(BOB, propertyId, parseEther('1'));
      const seen: unknown[] = [];
      h.ledger.registerReceiver(BOB, payment => {
        const auction = h.auction.getAuction(propertyId);
        seen.push(payment.amount, auction.highBidder, auction.highBid);
      });

      h.auction.bid(CAROL, propertyId, parseEther('2'));

      expect(seen).toEqual([parseEther('1'), CAROL, parseEther('2')]);
      expect(h.ledger.balanceOf(BOB)).toBe(STARTING_BALANCE);
      expect(h.ledger.balanceOf(CAROL)).toBe(parseEther('8'));
      expect(h.ledger.custodyBalance()).toBe(parseEther('2'));
    });

    it('closes at endTime and transfers title to the winner', () => {
      h.auction.bid(BOB, propertyId, parseEther('1'));
      h.auction.bid(CAROL, propertyId, parseEther('2'));
      expect(reasonOf(() => h.auction.endAuction(propertyId))).toBe('TOO_EARLY');

      h.clock.advance(3 * DAY);
      expect(reasonOf(() => h.auction.bid(BOB, propertyId, parseEther('3')))).toBe('AUCTION_CLOSED');

      expect(h.auction.endAuction(propertyId)).toEqual({ winner: CAROL, amount: parseEther('2') });
      expect(h.properties.ownerOf(propertyId)).toBe(CAROL);
      expect(h.ledger.balanceOf(ALICE)).toBe(parseEther('12'));
      expect(h.ledger.custodyBalance()).toBe(0n);
      expect(h.auction.getAuction(propertyId).ended).toBe(true);
      expect(h.notifications.list().pop()).toEqual(
        expect.objectContaining({ kind: 'AuctionEnded', winner: CAROL, amount: parseEther('2'), seller: ALICE }),
      );

      expect(reasonOf(() => h.auction.endAuction(propertyId))).toBe('ALREADY_ENDED');
      expect(reasonOf(() => h.auction.bid(BOB, propertyId, parseEther('3')))).toBe('AUCTION_CLOSED');
      expect(reasonOf(() => h.auction.startAuction(CAROL, propertyId, startPrice, DAY))).toBe('AUCTION_EXISTS');
    });
  });

  it('ends an auction without bids and leaves title in place', () => {
    h.auction.startAuction(ALICE, propertyId, 0n, 0);
    expect(reasonOf(() => h.auction.bid(BOB, propertyId, 1n))).toBe('AUCTION_CLOSED');

    expect(h.auction.endAuction(propertyId)).toEqual({ winner: null, amount: 0n });
    expect(h.properties.ownerOf(propertyId)).toBe(ALICE);
  });

  it('reports missing auctions as not found', () => {
    expect(reasonOf(() => h.auction.getAuction(propertyId))).toBe('AUCTION_NOT_FOUND');
    expect(reasonOf(() => h.auction.bid(BOB, propertyId, 1n))).toBe('AUCTION_NOT_FOUND');
    expect(reasonOf(() => h.auction.endAuction(propertyId))).toBe('AUCTION_NOT_FOUND');
  });
});
