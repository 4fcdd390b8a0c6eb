import { IsInt, IsNotEmpty, IsNumberString, Max, Min } from 'class-validator';

// 100 years of 30-day months
export const MAX_TERM_MONTHS = 1200;

export class ListForRentDto {
  @IsNumberString({ no_symbols: true })
  @IsNotEmpty()
  monthlyRent!: string; // wei
}

export class RentPropertyDto {
  @IsInt()
  @Min(1)
  @Max(MAX_TERM_MONTHS)
  months!: number;
}

export class ExtendRentalDto {
  @IsInt()
  @Min(1)
  @Max(MAX_TERM_MONTHS)
  additionalMonths!: number;
}
