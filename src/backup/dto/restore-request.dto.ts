import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsNotEmpty, IsOptional, IsString, Matches } from 'class-validator';

export class RestoreRequestDto {
  @ApiProperty({ example: 'restored/widgets', description: 'Directory below WORKSPACE_DIR' })
  @IsString()
  @IsNotEmpty()
  target!: string;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  overwrite?: boolean;

  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @IsBoolean()
  content?: boolean;

  @ApiPropertyOptional({ default: false, description: 'Replay labels, issues and releases' })
  @IsOptional()
  @IsBoolean()
  metadata?: boolean;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  dryRun?: boolean;

  @ApiPropertyOptional({ example: 'acme/widgets-restored' })
  @IsOptional()
  @Matches(/^[^/\s]+\/[^/\s]+$/, { message: 'intoRepository must be "owner/name"' })
  intoRepository?: string;
}
