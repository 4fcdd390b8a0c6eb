import { IsInt, Min } from 'class-validator';

export class AdvanceClockDto {
  @IsInt()
  @Min(0)
  seconds!: number;
}
