import { IsEthereumAddress, ValidateIf } from 'class-validator';

export class SetManagerDto {
  // null clears the manager
  @ValidateIf((_dto, value) => value !== null)
  @IsEthereumAddress()
  manager!: string | null;
}
