import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class ExplainProductDto {
  @IsString()
  @IsNotEmpty()
  productName!: string;

  @IsString()
  @IsOptional()
  @MaxLength(1000)
  question?: string;
}
