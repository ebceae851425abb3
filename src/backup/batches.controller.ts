import { Body, Controller, Inject, Param, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiSecurity, ApiTags } from '@nestjs/swagger';

import { BackupService } from './backup.service.js';
import { BatchBackupDto } from './dto/backup-request.dto.js';

@ApiTags('backups')
@ApiSecurity('X-API-Key')
@Controller('batches')
export class BatchesController {
  constructor(@Inject(BackupService) private readonly backups: BackupService) {}

  @Post()
  @ApiOperation({ summary: 'Back up every repository owned by the authenticated user' })
  @ApiBody({ type: BatchBackupDto, required: false })
  backupOwn(@Body() body: BatchBackupDto = {}) {
    return this.backups.backupAll(undefined, { includeMetadata: body.includeMetadata });
  }

  // POST /batches/acme
  @Post(':owner')
  @ApiOperation({ summary: 'Back up every repository of a user or organisation' })
  @ApiBody({ type: BatchBackupDto, required: false })
  backupOwner(@Param('owner') owner: string, @Body() body: BatchBackupDto = {}) {
    return this.backups.backupAll(owner, { includeMetadata: body.includeMetadata });
  }
}
