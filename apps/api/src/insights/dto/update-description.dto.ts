import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class UpdateDescriptionDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  description!: string;
}
