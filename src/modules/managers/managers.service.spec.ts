import { parseEther } from 'ethers';
import { ALICE, BOB, createHarness, Harness, MANAGER, reasonOf } from '../../testing/harness';

describe('ManagersService', () => {
  let h: Harness;
  let propertyId: number;

  beforeEach(async () => {
    h = await createHarness();
    propertyId = h.mintTo(ALICE);
  });

  afterEach(async () => {
    await h.close();
  });

  it('lets the owner appoint and clear a manager', () => {
    expect(h.managers.managerOf(propertyId)).toBeNull();

    h.managers.setManager(ALICE, propertyId, MANAGER);
    expect(h.managers.managerOf(propertyId)).toBe(MANAGER);
    expect(h.managers.isAuthorized(propertyId, MANAGER)).toBe(true);
    expect(h.managers.isAuthorized(propertyId, BOB)).toBe(false);

    h.managers.setManager(ALICE, propertyId, null);
    expect(h.managers.managerOf(propertyId)).toBeNull();
    expect(h.managers.isAuthorized(propertyId, MANAGER)).toBe(false);

    expect(h.notifications.list({ after: 1 }).map(entry => [entry.kind, Reflect.get(entry, 'manager')])).toEqual([
      ['ManagerChanged', MANAGER],
      ['ManagerChanged', null],
    ]);
  });

  it('lets a manager list the property but not appoint another manager', () => {
    h.managers.setManager(ALICE, propertyId, MANAGER);

    h.marketplace.listForSale(MANAGER, propertyId, parseEther('1'));
    expect(h.properties.getDetails(propertyId).forSale).toBe(true);

    expect(reasonOf(() => h.managers.setManager(MANAGER, propertyId, BOB))).toBe('NOT_OWNER');
    expect(h.managers.managerOf(propertyId)).toBe(MANAGER);
  });

  it('keeps the manager when title changes hands', () => {
    h.managers.setManager(ALICE, propertyId, MANAGER);
    h.marketplace.listForSale(ALICE, propertyId, parseEther('1'));
    h.marketplace.makeOffer(BOB, propertyId, parseEther('1'));
    h.marketplace.acceptOffer(ALICE, propertyId, BOB);

    expect(h.managers.managerOf(propertyId)).toBe(MANAGER);
    expect(h.managers.isAuthorized(propertyId, BOB)).toBe(true);
    expect(h.managers.isAuthorized(propertyId, ALICE)).toBe(false);
  });

  it('reports unknown properties as not found', () => {
    expect(reasonOf(() => h.managers.setManager(ALICE, 42, MANAGER))).toBe('PROPERTY_NOT_FOUND');
  });
});
