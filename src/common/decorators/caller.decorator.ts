import { BadRequestException, createParamDecorator, ExecutionContext } from '@nestjs/common';
import { getAddress, isAddress } from 'ethers';
import { Request } from 'express';

export const CALLER_HEADER = 'x-caller';
export const VALUE_HEADER = 'x-value';

function headerValue(request: Request, name: string): string | undefined {
  const raw = request.headers[name];
  return Array.isArray(raw) ? raw[0] : raw;
}

/** Checksummed account of the request's sender, read from the `x-caller` header. */
export const Caller = createParamDecorator((_data: unknown, ctx: ExecutionContext): string => {
  const request = ctx.switchToHttp().getRequest<Request>();
  const caller = headerValue(request, CALLER_HEADER);
  if (!caller || !isAddress(caller)) {
    throw new BadRequestException(`Missing or invalid ${CALLER_HEADER} header`);
  }
  return getAddress(caller);
});

/** Native value attached to the request in wei (`x-value` header), 0 when absent. */
export const AttachedValue = createParamDecorator((_data: unknown, ctx: ExecutionContext): bigint => {
  const request = ctx.switchToHttp().getRequest<Request>();
  const raw = headerValue(request, VALUE_HEADER);
  if (raw === undefined || raw === '') {
    return 0n;
  }
  if (!/^\d+$/.test(raw)) {
    throw new BadRequestException(`${VALUE_HEADER} must be a non-negative integer amount in wei`);
  }
  return BigInt(raw);
});
