import { Transform } from 'class-transformer';
import { IsNotEmpty, IsNumberString, IsOptional, IsString } from 'class-validator';

// Numeric fields arrive as strings or numbers depending on endpoint version.
const numericToString = ({ value }: { value: unknown }): unknown =>
  typeof value === 'number' ? String(value) : value;

// Raw trade record from GET /builder/trades. Unlisted fields are ignored.
export class BuilderTradeDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  owner!: string;

  // ISO-8601 or unix seconds
  @Transform(numericToString)
  @IsString()
  @IsNotEmpty()
  matchTime!: string;

  @IsOptional()
  @Transform(numericToString)
  @IsNumberString()
  sizeUsdc?: string;

  @IsOptional()
  @Transform(numericToString)
  @IsNumberString()
  size?: string;

  @IsOptional()
  @Transform(numericToString)
  @IsNumberString()
  price?: string;

  @IsOptional()
  @IsString()
  transactionHash?: string;
}
