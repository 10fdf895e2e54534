import { IsNotEmpty, IsString } from 'class-validator';

export class TokenRequestDto {
  @IsString()
  @IsNotEmpty({ message: 'api_key is required' })
  api_key!: string;
}
