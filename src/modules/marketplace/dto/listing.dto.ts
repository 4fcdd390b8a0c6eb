import { IsNotEmpty, IsNumberString } from 'class-validator';

export class ListForSaleDto {
  @IsNumberString({ no_symbols: true })
  @IsNotEmpty()
  price!: string; // wei
}
