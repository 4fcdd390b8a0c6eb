import { IsInt, IsNotEmpty, IsNumberString, Min } from 'class-validator';

export class StartAuctionDto {
  @IsNumberString({ no_symbols: true })
  @IsNotEmpty()
  startPrice!: string; // wei

  @IsInt()
  @Min(0)
  duration!: number; // seconds
}
