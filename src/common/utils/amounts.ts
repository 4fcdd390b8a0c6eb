import { formatEther } from 'ethers';

export const SECONDS_PER_DAY = 24 * 60 * 60;
// Rental terms count fixed 30-day months, never calendar months.
export const SECONDS_PER_MONTH = 30 * SECONDS_PER_DAY;

/** Parses a decimal wei string already checked by the DTO layer. */
export function toWei(value: string): bigint {
  return BigInt(value);
}

export function formatAmount(amount: bigint): string {
  return `${formatEther(amount)} ETH`;
}
