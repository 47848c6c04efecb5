import { CliUtilityService, Command, CommandRunner, Option } from 'nest-commander'
import { Logger } from '@nestjs/common'
import {
  InputsSource,
  MaintainerConfig,
  MaintainerSDK,
  PoolMetrics,
  SnapshotError,
  SolidoState,
  StakeTime,
} from '@solido-maintainer/sdk'
import fs from 'fs'
import { setTimeout as sleep } from 'timers/promises'
import { ConfigService } from '../config/config.service'
import { LoggingSubmitter } from '../submitter/logging.submitter'

const COMMAND_NAME = 'run-maintainer'

const DEFAULT_INTERVAL_SECONDS = 30

export type RunMaintainerCommandOptions = Partial<MaintainerConfig & {
  configFilePath: string
  metricsFilePath: string
  intervalSeconds: number
  maxIterations: number
}>

export enum IterationOutcome {
  PERFORMED = 'PERFORMED',
  NOTHING_TO_DO = 'NOTHING_TO_DO',
  OFF_DUTY = 'OFF_DUTY',
  SNAPSHOT_FAILED = 'SNAPSHOT_FAILED',
}

@Command({
  name: COMMAND_NAME,
  description: 'Keep the pool maintained: take a snapshot, perform maintenance while on duty, repeat',
})
export class RunMaintainerCommand extends CommandRunner {
  private readonly logger = new Logger()

  constructor (
    private readonly nestCliUtilSvc: CliUtilityService,
    private readonly configService: ConfigService,
    private readonly submitter: LoggingSubmitter,
  ) {
    super()
  }

  async run (inputs: string[], options: RunMaintainerCommandOptions): Promise<void> {
    const config: RunMaintainerCommandOptions = { ...this.configService.loadMaintainerConfig(options.configFilePath), ...options }
    const intervalMs = (config.intervalSeconds ?? DEFAULT_INTERVAL_SECONDS) * 1000
    const maxIterations = config.maxIterations ?? Infinity

    this.logger.log(`Running "${COMMAND_NAME}" command...`, { ...config })
    const sdk = new MaintainerSDK({ ...config })
    for (let iteration = 0; iteration < maxIterations; iteration++) {
      const outcome = await this.runIteration(sdk, config.metricsFilePath)
      // More work may be left after a performed step, take the next snapshot right away.
      if (outcome !== IterationOutcome.PERFORMED && iteration + 1 < maxIterations) {
        await sleep(intervalMs)
      }
    }
    this.logger.log(`Finished "${COMMAND_NAME}" command`)
  }

  async runIteration (sdk: MaintainerSDK, metricsFilePath?: string): Promise<IterationOutcome> {
    let state: SolidoState
    try {
      state = await sdk.getState()
    } catch (err) {
      if (err instanceof SnapshotError) {
        this.logger.warn('Failed to take a snapshot, will retry', { err })
        return IterationOutcome.SNAPSHOT_FAILED
      }
      throw err
    }

    const metrics = sdk.collectMetrics(state)
    this.logMetrics(metrics)
    if (metricsFilePath) {
      fs.writeFileSync(metricsFilePath, JSON.stringify(metrics, null, 2))
    }

    const duty = sdk.getMaintainerDuty(state)
    if (!duty.isOnDuty) {
      this.logger.log('Not on duty', { slot: state.clock.slot, current: duty.current, nextDutySlot: duty.nextDutySlot })
      return IterationOutcome.OFF_DUTY
    }

    const output = await sdk.tryPerformMaintenance(state, this.submitter)
    return output ? IterationOutcome.PERFORMED : IterationOutcome.NOTHING_TO_DO
  }

  private logMetrics (metrics: PoolMetrics) {
    this.logger.log('Pool metrics', {
      slot: metrics.slot,
      epoch: metrics.epoch,
      reserveBalanceSol: metrics.reserveBalanceSol,
      stSolSupply: metrics.stSolSupply,
      validators: metrics.validators.length,
    })
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
    flags: '-m, --metrics-file-path <string>',
    name: 'metricsFilePath',
    description: 'File to write the pool metrics into after every snapshot',
  })
  parseOptMetricsFilePath (val: string) {
    return val
  }
  @Option({
    flags: '--interval <number>',
    name: 'intervalSeconds',
    description: `Seconds to wait between snapshots when there is nothing to do (default ${DEFAULT_INTERVAL_SECONDS})`,
  })
  parseOptIntervalSeconds (val: string) {
    return this.nestCliUtilSvc.parseFloat(val)
  }
  @Option({
    flags: '--max-iterations <number>',
    name: 'maxIterations',
    description: 'Stop after this many snapshots (runs forever by default)',
  })
  parseOptMaxIterations (val: string) {
    return this.nestCliUtilSvc.parseInt(val)
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
    flags: '--name-prefix <string>',
    name: 'validatorNamePrefix',
    description: 'SDK param `validatorNamePrefix`',
  })
  parseOptValidatorNamePrefix (val: string) {
    return val
  }
}
