import { IsString, Matches } from 'class-validator';
import { Transform } from 'class-transformer';

export class ChangeTickerDto {
  @IsString()
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toUpperCase() : value))
  @Matches(/^[A-Z0-9.\-^=]{1,12}$/, {
    message: 'Symbol must be 1-12 characters: letters, digits, dots, hyphens, ^ or =',
  })
  symbol!: string;
}
