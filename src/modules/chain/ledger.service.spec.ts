import { parseEther } from 'ethers';
import { AuthorizationError, InsufficientPaymentError, InvalidArgumentError } from '../../common/errors/domain-errors';
import { ADMIN, ALICE, BOB, createHarness, Harness, STARTING_BALANCE } from '../../testing/harness';

describe('LedgerService', () => {
  let h: Harness;

  beforeEach(async () => {
    h = await createHarness();
  });

  afterEach(async () => {
    await h.close();
  });

  it('lets only privileged accounts fund balances', () => {
    expect(() => h.ledger.fund(ALICE, BOB, 1n)).toThrow(AuthorizationError);
    expect(() => h.ledger.fund(ADMIN, BOB, 0n)).toThrow(InvalidArgumentError);
    expect(h.ledger.fund(ADMIN, BOB, 5n)).toBe(STARTING_BALANCE + 5n);
  });

  it('moves attached value into custody and back out', () => {
    h.chainState.transact('escrow', () => h.ledger.collect(ALICE, parseEther('2')));
    expect(h.ledger.balanceOf(ALICE)).toBe(parseEther('8'));
    expect(h.ledger.custodyBalance()).toBe(parseEther('2'));

    h.chainState.transact('release', () => h.ledger.pay(BOB, parseEther('2')));
    expect(h.ledger.balanceOf(BOB)).toBe(parseEther('12'));
    expect(h.ledger.custodyBalance()).toBe(0n);
  });

  it('rejects value an account does not hold', () => {
    expect(() => h.chainState.transact('overdraw', () => h.ledger.collect(ALICE, parseEther('11')))).toThrow(
      InsufficientPaymentError,
    );
    expect(h.ledger.balanceOf(ALICE)).toBe(STARTING_BALANCE);
  });

  it('runs the recipient receiver and aborts the payment when it throws', () => {
    const received: bigint[] = [];
    const unregister = h.ledger.registerReceiver(BOB, payment => received.push(payment.amount));
    h.chainState.transact('escrow', () => h.ledger.collect(ALICE, 3n));
    h.chainState.transact('release', () => h.ledger.pay(BOB, 1n));
    expect(received).toEqual([1n]);
    unregister();

    h.ledger.registerReceiver(BOB, () => {
      throw new Error('payment rejected');
    });
    expect(() => h.chainState.transact('release', () => h.ledger.pay(BOB, 2n))).toThrow('payment rejected');
    expect(h.ledger.balanceOf(BOB)).toBe(STARTING_BALANCE + 1n);
    expect(h.ledger.custodyBalance()).toBe(2n);
  });
});
