import { IsInt, IsOptional, Max, Min } from 'class-validator';

export class ListVerificationsInput {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(200)
  limit?: number;
}

export class RecentVerificationsInput {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(50)
  perMailbox?: number;
}
