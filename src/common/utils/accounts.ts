import { BadRequestException } from '@nestjs/common';
import { getAddress, isAddress } from 'ethers';

/** Validates an address from a route or body and returns its checksummed form. */
export function parseAccount(address: string): string {
  if (!isAddress(address)) {
    throw new BadRequestException(`Invalid account address: ${address}`);
  }
  return getAddress(address);
}
