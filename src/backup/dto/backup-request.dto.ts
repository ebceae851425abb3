import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsArray, IsBoolean, IsIn, IsOptional } from 'class-validator';
import { ENTITY_CLASSES, type EntityClass } from '../backup.types.js';

export class BackupRequestDto {
  @ApiPropertyOptional({ default: true, description: 'Also snapshot issues, pull requests, releases and the descriptor' })
  @IsOptional()
  @IsBoolean()
  includeMetadata?: boolean;

  @ApiPropertyOptional({ enum: [...ENTITY_CLASSES], isArray: true, example: ['issues', 'releases'] })
  @IsOptional()
  @IsArray()
  @IsIn(ENTITY_CLASSES, { each: true })
  entityClasses?: EntityClass[];
}

export class BatchBackupDto {
  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @IsBoolean()
  includeMetadata?: boolean;
}
