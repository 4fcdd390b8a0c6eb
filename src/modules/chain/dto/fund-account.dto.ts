import { IsNotEmpty, IsNumberString } from 'class-validator';

export class FundAccountDto {
  @IsNumberString({ no_symbols: true })
  @IsNotEmpty()
  amount!: string; // wei
}
