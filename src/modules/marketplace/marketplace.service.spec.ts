import { parseEther } from 'ethers';
import { AuthorizationError, NotFoundError } from '../../common/errors/domain-errors';
import { ALICE, BOB, CAROL, createHarness, Harness, MANAGER, reasonOf, STARTING_BALANCE } from '../../testing/harness';

describe('MarketplaceService', () => {
  let h: Harness;
  let propertyId: number;

  beforeEach(async () => {
    h = await createHarness();
    propertyId = h.mintTo(ALICE);
  });

  afterEach(async () => {
    await h.close();
  });

  describe('listForSale', () => {
    it('records the price and emits Listed', () => {
      h.marketplace.listForSale(ALICE, propertyId, parseEther('1'));

      const details = h.properties.getDetails(propertyId);
      expect(details.forSale).toBe(true);
      expect(details.salePrice).toBe(parseEther('1'));
      expect(h.notifications.list({ after: 1 })).toEqual([
        expect.objectContaining({ kind: 'Listed', propertyId, price: parseEther('1') }),
      ]);
    });

    it('rejects strangers and non-positive prices', () => {
      expect(() => h.marketplace.listForSale(BOB, propertyId, parseEther('1'))).toThrow(AuthorizationError);
      expect(reasonOf(() => h.marketplace.listForSale(ALICE, propertyId, 0n))).toBe('INVALID_PRICE');
      expect(h.properties.getDetails(propertyId).forSale).toBe(false);
    });

    it('refuses a rented property whoever asks', () => {
      h.rent.listForRent(ALICE, propertyId, parseEther('0.1'));
      h.rent.rentProperty(BOB, propertyId, 1, parseEther('0.1'));

      expect(reasonOf(() => h.marketplace.listForSale(ALICE, propertyId, parseEther('1')))).toBe('RENTED');
      expect(reasonOf(() => h.marketplace.listForSale(CAROL, propertyId, parseEther('1')))).toBe('RENTED');
    });
  });

  describe('offers', () => {
    beforeEach(() => {
      h.marketplace.listForSale(ALICE, propertyId, parseEther('1'));
    });

    it('requires a listing and a positive value', () => {
      const unlisted = h.mintTo(ALICE);
      expect(reasonOf(() => h.marketplace.makeOffer(BOB, unlisted, parseEther('1')))).toBe('NOT_FOR_SALE');
      expect(reasonOf(() => h.marketplace.makeOffer(BOB, propertyId, 0n))).toBe('INVALID_AMOUNT');
      expect(reasonOf(() => h.marketplace.makeOffer(BOB, propertyId, parseEther('11')))).toBe('INSUFFICIENT_FUNDS');
      expect(h.ledger.balanceOf(BOB)).toBe(STARTING_BALANCE);
    });

    it('replaces a repeat offer and keeps the replaced value in custody', () => {
      h.marketplace.makeOffer(BOB, propertyId, parseEther('1'));
      h.marketplace.makeOffer(BOB, propertyId, parseEther('2'));

      expect(h.marketplace.offerOf(propertyId, BOB)).toBe(parseEther('2'));
      expect(h.ledger.balanceOf(BOB)).toBe(parseEther('7'));
      expect(h.ledger.custodyBalance()).toBe(parseEther('3'));

      expect(h.marketplace.withdrawOffer(BOB, propertyId)).toBe(parseEther('2'));
      expect(h.ledger.balanceOf(BOB)).toBe(parseEther('9'));
      expect(h.ledger.custodyBalance()).toBe(parseEther('1'));
      expect(() => h.marketplace.withdrawOffer(BOB, propertyId)).toThrow(NotFoundError);
    });

    it('sells to the accepted buyer and leaves other offers withdrawable', () => {
      h.marketplace.makeOffer(BOB, propertyId, parseEther('1.5'));
      h.marketplace.makeOffer(CAROL, propertyId, parseEther('1.2'));
      expect(h.marketplace.offersFor(propertyId)).toEqual([
        { bidder: BOB, amount: parseEther('1.5') },
        { bidder: CAROL, amount: parseEther('1.2') },
      ]);

      h.marketplace.acceptOffer(ALICE, propertyId, BOB);

      expect(h.properties.ownerOf(propertyId)).toBe(BOB);
      expect(h.properties.getDetails(propertyId)).toMatchObject({ forSale: false, salePrice: 0n });
      expect(h.ledger.balanceOf(ALICE)).toBe(parseEther('11.5'));
      expect(h.ledger.balanceOf(BOB)).toBe(parseEther('8.5'));
      expect(h.marketplace.offerOf(propertyId, BOB)).toBe(0n);
      expect(h.marketplace.offerOf(propertyId, CAROL)).toBe(parseEther('1.2'));
      expect(h.ledger.custodyBalance()).toBe(parseEther('1.2'));

      const accepted = h.notifications.list({ after: 4 });
      expect(accepted).toEqual([
        expect.objectContaining({
          kind: 'OfferAccepted',
          sequence: 5,
          propertyId,
          buyer: BOB,
          seller: ALICE,
          amount: parseEther('1.5'),
        }),
      ]);

      expect(h.marketplace.withdrawOffer(CAROL, propertyId)).toBe(parseEther('1.2'));
      expect(h.ledger.balanceOf(CAROL)).toBe(STARTING_BALANCE);
    });

    it('rejects accepting a missing offer or an unlisted property', () => {
      expect(reasonOf(() => h.marketplace.acceptOffer(ALICE, propertyId, BOB))).toBe('OFFER_NOT_FOUND');
      expect(reasonOf(() => h.marketplace.acceptOffer(CAROL, propertyId, BOB))).toBe('NOT_AUTHORIZED');

      h.marketplace.makeOffer(BOB, propertyId, parseEther('1'));
      h.marketplace.makeOffer(CAROL, propertyId, parseEther('1'));
      h.marketplace.acceptOffer(ALICE, propertyId, BOB);
      expect(reasonOf(() => h.marketplace.acceptOffer(BOB, propertyId, CAROL))).toBe('NOT_FOR_SALE');
    });

    it('pays the owner when a manager accepts', () => {
      h.managers.setManager(ALICE, propertyId, MANAGER);
      h.marketplace.makeOffer(BOB, propertyId, parseEther('1'));

      h.marketplace.acceptOffer(MANAGER, propertyId, BOB);

      expect(h.ledger.balanceOf(ALICE)).toBe(parseEther('11'));
      expect(h.ledger.balanceOf(MANAGER)).toBe(0n);
    });

    it('has settled every state change by the time the seller is paid', () => {
      h.marketplace.makeOffer(BOB, propertyId, parseEther('1'));
      const seen: unknown[] = [];
      h.ledger.registerReceiver(ALICE, () => {
        seen.push(h.properties.ownerOf(propertyId));
        seen.push(h.properties.getDetails(propertyId).forSale);
        seen.push(h.marketplace.offerOf(propertyId, BOB));
        seen.push(reasonOf(() => h.marketplace.withdrawOffer(BOB, propertyId)));
      });

      h.marketplace.acceptOffer(ALICE, propertyId, BOB);

      expect(seen).toEqual([BOB, false, 0n, 'OFFER_NOT_FOUND']);
      expect(h.ledger.balanceOf(BOB)).toBe(parseEther('9'));
      expect(h.ledger.custodyBalance()).toBe(0n);
    });

    it('logs a withdrawal before anything the refunded bidder does on receipt', () => {
      h.marketplace.makeOffer(BOB, propertyId, parseEther('1'));
      const unregister = h.ledger.registerReceiver(BOB, () => {
        unregister();
        h.marketplace.makeOffer(BOB, propertyId, parseEther('2'));
      });

      h.marketplace.withdrawOffer(BOB, propertyId);

      expect(h.marketplace.offerOf(propertyId, BOB)).toBe(parseEther('2'));
      expect(h.notifications.list({ after: 3 }).map(entry => `${entry.sequence}:${entry.kind}`)).toEqual([
        '4:OfferWithdrawn',
        '5:OfferMade',
      ]);
    });

    it('rolls the whole sale back when the seller rejects the payment', () => {
      h.marketplace.makeOffer(BOB, propertyId, parseEther('1'));
      h.ledger.registerReceiver(ALICE, () => {
        throw new Error('cannot receive');
      });

      expect(() => h.marketplace.acceptOffer(ALICE, propertyId, BOB)).toThrow('cannot receive');

      expect(h.properties.ownerOf(propertyId)).toBe(ALICE);
      expect(h.properties.getDetails(propertyId).forSale).toBe(true);
      expect(h.marketplace.offerOf(propertyId, BOB)).toBe(parseEther('1'));
      expect(h.ledger.balanceOf(ALICE)).toBe(STARTING_BALANCE);
      expect(h.notifications.list().map(entry => entry.kind)).toEqual(['Minted', 'Listed', 'OfferMade']);
    });
  });
});
