import { IsNotEmpty, IsNumber, IsOptional, IsPositive, IsString, Max } from 'class-validator';
import type { RollingDeployRequest } from '../interfaces';

/** Validated form of {@link RollingDeployRequest}. Use plainToInstance + validate before starting a rollout. */
export class RollingDeployRequestDto implements RollingDeployRequest {
  @IsNotEmpty({ message: 'stackId is required' })
  @IsString()
  stackId!: string;

  @IsNotEmpty({ message: 'layerId is required' })
  @IsString()
  layerId!: string;

  @IsNotEmpty({ message: 'appId is required' })
  @IsString()
  appId!: string;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  @Max(1)
  percent?: number;
}
