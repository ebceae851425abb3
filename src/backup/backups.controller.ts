import { Body, Controller, Get, Inject, Param, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiSecurity, ApiTags } from '@nestjs/swagger';

import { SnapshotNotFoundError } from '../common/errors.js';
import { repositoryRef } from '../common/repository-ref.js';
import { BackupService } from './backup.service.js';
import { BackupRequestDto } from './dto/backup-request.dto.js';
import { RestoreRequestDto } from './dto/restore-request.dto.js';

@ApiTags('backups')
@ApiSecurity('X-API-Key')
@Controller('backups')
export class BackupsController {
  constructor(@Inject(BackupService) private readonly backups: BackupService) {}

  @Get()
  @ApiOperation({ summary: 'Repositories with backups, with snapshot counts' })
  listRepositories() {
    return this.backups.listRepositories();
  }

  @Get(':owner/:name')
  @ApiOperation({ summary: 'Committed snapshots of a repository, newest first' })
  listSnapshots(@Param('owner') owner: string, @Param('name') name: string) {
    return this.backups.listSnapshots(repositoryRef(owner, name));
  }

  @Get(':owner/:name/:timestamp')
  @ApiOperation({ summary: 'Manifest and size of one committed snapshot' })
  async getSnapshot(
    @Param('owner') owner: string,
    @Param('name') name: string,
    @Param('timestamp') timestamp: string,
  ) {
    const detail = await this.backups.getSnapshot(this.backups.snapshotId(owner, name, timestamp));
    if (!detail) {
      throw new SnapshotNotFoundError(`No committed snapshot ${owner}/${name}@${timestamp}`);
    }
    return detail;
  }

  // POST /backups/acme/widgets  { "entityClasses": ["issues"] }
  @Post(':owner/:name')
  @ApiOperation({ summary: 'Back up one repository (content mirror + metadata)' })
  @ApiBody({ type: BackupRequestDto, required: false })
  backup(
    @Param('owner') owner: string,
    @Param('name') name: string,
    @Body() body: BackupRequestDto = {},
  ) {
    return this.backups.backup(repositoryRef(owner, name), {
      includeMetadata: body.includeMetadata,
      entityClasses: body.entityClasses,
    });
  }

  @Post(':owner/:name/:timestamp/resume')
  @ApiOperation({ summary: 'Re-run an interrupted snapshot that has no committed manifest' })
  resume(
    @Param('owner') owner: string,
    @Param('name') name: string,
    @Param('timestamp') timestamp: string,
  ) {
    return this.backups.resume(this.backups.snapshotId(owner, name, timestamp));
  }

  @Post(':owner/:name/:timestamp/restore')
  @ApiOperation({ summary: 'Restore a snapshot into a local working copy, optionally replaying metadata' })
  @ApiBody({ type: RestoreRequestDto })
  restore(
    @Param('owner') owner: string,
    @Param('name') name: string,
    @Param('timestamp') timestamp: string,
    @Body() body: RestoreRequestDto,
  ) {
    return this.backups.restore(this.backups.snapshotId(owner, name, timestamp), {
      ...body,
      confineToWorkspace: true,
    });
  }
}
