import { IsInt, IsOptional, IsString, MaxLength, Min } from 'class-validator';

export class RequestMailboxInput {
  @IsOptional()
  @IsString()
  @MaxLength(253)
  domain?: string;

  // Range against the configured TTL bounds is checked at provisioning.
  @IsOptional()
  @IsInt()
  @Min(1)
  ttlSeconds?: number;
}
