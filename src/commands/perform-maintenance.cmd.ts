import { CliUtilityService, Command, CommandRunner, Option } from 'nest-commander'
import { Logger } from '@nestjs/common'
import {
  formatMaintenanceOutput,
  InputsSource,
  MaintainerConfig,
  MaintainerSDK,
  MaintenanceOutput,
  serializeMaintenanceOutput,
  SolidoState,
  StakeTime,
} from '@solido-maintainer/sdk'
import fs from 'fs'
import { ConfigService } from '../config/config.service'
import { LoggingSubmitter } from '../submitter/logging.submitter'

const COMMAND_NAME = 'perform-maintenance'

export type PerformMaintenanceCommandOptions = Partial<MaintainerConfig & {
  configFilePath: string
  outputFilePath: string
}>

export type PerformMaintenanceResult = {
  state: SolidoState
  output: MaintenanceOutput | null
}

@Command({
  name: COMMAND_NAME,
  description: 'Perform a single maintenance step on a fresh snapshot, if there is one to perform',
})
export class PerformMaintenanceCommand extends CommandRunner {
  private readonly logger = new Logger()

  constructor (
    private readonly nestCliUtilSvc: CliUtilityService,
    private readonly configService: ConfigService,
    private readonly submitter: LoggingSubmitter,
  ) {
    super()
  }

  async run (inputs: string[], options: PerformMaintenanceCommandOptions): Promise<void> {
    const config: PerformMaintenanceCommandOptions = { ...this.configService.loadMaintainerConfig(options.configFilePath), ...options }

    this.logger.log(`Running "${COMMAND_NAME}" command...`, { ...config })
    const { state, output } = await this.performMaintenance(config)
    this.logger.log(`Finished "${COMMAND_NAME}" command`, { slot: state.clock.slot, task: output?.task ?? null })

    console.log(output ? formatMaintenanceOutput(output) : 'Nothing done.')

    if (config.outputFilePath) {
      this.storeResult(state, output, config.outputFilePath)
    }
  }

  async performMaintenance (config: Partial<MaintainerConfig>): Promise<PerformMaintenanceResult> {
    const sdk = new MaintainerSDK({ ...config })
    const state = await sdk.getState()
    const output = await sdk.tryPerformMaintenance(state, this.submitter)
    return { state, output }
  }

  storeResult (state: SolidoState, output: MaintenanceOutput | null, outputFilePath: string) {
    const resultStr = JSON.stringify({
      producedAt: state.producedAt,
      slot: state.clock.slot,
      epoch: state.clock.epoch,
      output: output && serializeMaintenanceOutput(output),
    }, null, 2)
    fs.writeFileSync(outputFilePath, resultStr)
  }

  @Option({
    flags: '-c, --config-file-path <string>',
    name: 'configFilePath',
    description: 'File to read base config from (overridden by other options)',
  })
  parseOptConfigFilePath (val: string) {
    return val
  }
  @Option({
    flags: '-o, --output-file-path <string>',
    name: 'outputFilePath',
    description: 'File to write the performed maintenance into',
  })
  parseOptOutputFilePath (val: string) {
    return val
  }

  @Option({
    flags: '-i, --inputs-source <string>',
    name: 'inputsSource',
    description: 'SDK param `inputsSource`',
    choices: Object.values(InputsSource),
  })
  parseOptInputsSource (val: string) {
    return val
  }
  @Option({
    flags: '--cache-dir-path <string>',
    name: 'inputsCacheDirPath',
    description: 'SDK param `inputsCacheDirPath`',
  })
  parseOptInputsCacheDirPath (val: string) {
    return val
  }
  @Option({
    flags: '--cache-inputs',
    name: 'cacheInputs',
    description: 'SDK param `cacheInputs`',
  })
  parseOptCacheInputs () {
    return true
  }

  @Option({
    flags: '--snapshot-url <string>',
    name: 'snapshotApiBaseUrl',
    description: 'SDK param `snapshotApiBaseUrl`',
  })
  parseOptSnapshotApiBaseUrl (val: string) {
    return val
  }
  @Option({
    flags: '--solido-program-id <string>',
    name: 'solidoProgramId',
    description: 'SDK param `solidoProgramId`',
  })
  parseOptSolidoProgramId (val: string) {
    return val
  }
  @Option({
    flags: '--solido-address <string>',
    name: 'solidoAddress',
    description: 'SDK param `solidoAddress`',
  })
  parseOptSolidoAddress (val: string) {
    return val
  }
  @Option({
    flags: '--maintainer-address <string>',
    name: 'maintainerAddress',
    description: 'SDK param `maintainerAddress`',
  })
  parseOptMaintainerAddress (val: string) {
    return val
  }

  @Option({
    flags: '--stake-time <string>',
    name: 'stakeTime',
    description: 'SDK param `stakeTime`',
    choices: Object.values(StakeTime),
  })
  parseOptStakeTime (val: string) {
    return val
  }
  @Option({
    flags: '--end-of-epoch-threshold <number>',
    name: 'endOfEpochThreshold',
    description: 'SDK param `endOfEpochThreshold` (percent)',
  })
  parseOptEndOfEpochThreshold (val: string) {
    return this.nestCliUtilSvc.parseInt(val)
  }

  @Option({
    flags: '--debug-vote-accounts <string...>',
    name: 'debugVoteAccounts',
    description: 'SDK param `debugVoteAccounts` (space separated)',
  })
  parseOptDebugVoteAccounts (option: string, optionsAccumulator: string[] = []): string[] {
    optionsAccumulator.push(option)
    return optionsAccumulator
  }
}
