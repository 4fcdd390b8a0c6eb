import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getAddress, isAddress } from 'ethers';
import { AuthorizationError } from '../../common/errors/domain-errors';
import { Account } from './world-state';

@Injectable()
export class AccessControlService {
  private readonly logger = new Logger(AccessControlService.name);
  private readonly privileged: ReadonlySet<Account>;

  constructor(private configService: ConfigService) {
    const configured = this.configService.get<string>('PRIVILEGED_ACCOUNTS', '');
    const accounts = configured
      .split(',')
      .map(entry => entry.trim())
      .filter(entry => entry !== '');

    for (const account of accounts) {
      if (!isAddress(account)) {
        throw new Error(`PRIVILEGED_ACCOUNTS contains an invalid address: ${account}`);
      }
    }
    this.privileged = new Set(accounts.map(account => getAddress(account)));

    if (this.privileged.size === 0) {
      this.logger.warn('PRIVILEGED_ACCOUNTS is empty; minting and funding are disabled.');
    } else {
      this.logger.log(`Loaded ${this.privileged.size} privileged account(s).`);
    }
  }

  isPrivileged(caller: Account): boolean {
    return this.privileged.has(caller);
  }

  requirePrivileged(caller: Account): void {
    if (!this.isPrivileged(caller)) {
      throw new AuthorizationError('NOT_PRIVILEGED', 'Caller is not a privileged account');
    }
  }
}
