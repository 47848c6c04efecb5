import { Module } from '@nestjs/common'
import { CliUtilityService } from 'nest-commander'

import { MaintainerDutyCommand } from './commands/maintainer-duty.cmd'
import { PerformMaintenanceCommand } from './commands/perform-maintenance.cmd'
import { RunMaintainerCommand } from './commands/run-maintainer.cmd'
import { ConfigModule } from './config/config.module'
import { LoggingSubmitter } from './submitter/logging.submitter'

@Module({
  imports: [ConfigModule],
  providers: [CliUtilityService, LoggingSubmitter, PerformMaintenanceCommand, RunMaintainerCommand, MaintainerDutyCommand],
})
export class CliModule {}
