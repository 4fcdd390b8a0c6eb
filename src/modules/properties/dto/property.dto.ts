import { IsEthereumAddress, IsInt, IsNotEmpty, IsString, MaxLength, Min } from 'class-validator';

export class MintPropertyDto {
  @IsEthereumAddress()
  to!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(256)
  location!: string;

  @IsInt()
  @Min(0)
  area!: number; // square units

  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  category!: string; // e.g. 'house', 'apartment'
}
