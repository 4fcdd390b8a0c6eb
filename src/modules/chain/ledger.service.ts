import { Injectable, Logger } from '@nestjs/common';
import { InsufficientPaymentError, InvalidArgumentError } from '../../common/errors/domain-errors';
import { formatAmount } from '../../common/utils/amounts';
import { AccessControlService } from './access-control.service';
import { ChainStateService } from './chain-state.service';
import { Account } from './world-state';

export interface Payment {
  to: Account;
  amount: bigint;
}

/** Code that runs when an account receives value; throwing rejects the payment. */
export type PaymentReceiver = (payment: Payment) => void;

@Injectable()
export class LedgerService {
  private readonly logger = new Logger(LedgerService.name);
  private readonly receivers = new Map<Account, PaymentReceiver>();

  constructor(
    private chainState: ChainStateService,
    private accessControl: AccessControlService,
  ) {}

  balanceOf(account: Account): bigint {
    return this.chainState.read(world => world.balances.get(account) ?? 0n);
  }

  custodyBalance(): bigint {
    return this.chainState.read(world => world.custody);
  }

  fund(caller: Account, account: Account, amount: bigint): bigint {
    return this.chainState.transact('fund', () => {
      this.accessControl.requirePrivileged(caller);
      if (amount <= 0n) {
        throw new InvalidArgumentError('INVALID_AMOUNT', 'Funding amount must be positive');
      }
      this.chainState.write(world => {
        world.balances.set(account, (world.balances.get(account) ?? 0n) + amount);
      });
      this.logger.log(`Funded ${account} with ${formatAmount(amount)}`);
      return this.balanceOf(account);
    });
  }

  /** Moves value attached by `from` into custody. Counts as a state write. */
  collect(from: Account, amount: bigint): void {
    if (amount === 0n) {
      return;
    }
    this.chainState.write(world => {
      const balance = world.balances.get(from) ?? 0n;
      if (balance < amount) {
        throw new InsufficientPaymentError(
          'INSUFFICIENT_FUNDS',
          `${from} holds ${formatAmount(balance)}, cannot attach ${formatAmount(amount)}`,
        );
      }
      world.balances.set(from, balance - amount);
      world.custody += amount;
    });
  }

  /**
   * Pushes value out of custody. Ends the calling operation's write phase, then
   * gives the recipient's receiver a chance to run (and to reject the payment).
   */
  pay(to: Account, amount: bigint): void {
    if (amount === 0n) {
      return;
    }
    this.chainState.settle(world => {
      if (world.custody < amount) {
        throw new Error(`Custody holds ${formatAmount(world.custody)}, cannot pay ${formatAmount(amount)}`);
      }
      world.custody -= amount;
      world.balances.set(to, (world.balances.get(to) ?? 0n) + amount);
    });
    this.logger.log(`Paid ${formatAmount(amount)} to ${to}`);
    this.receivers.get(to)?.({ to, amount });
  }

  registerReceiver(account: Account, receiver: PaymentReceiver): () => void {
    this.receivers.set(account, receiver);
    return () => {
      if (this.receivers.get(account) === receiver) {
        this.receivers.delete(account);
      }
    };
  }
}
