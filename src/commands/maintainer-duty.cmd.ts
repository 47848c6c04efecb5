import { Command, CommandRunner, Option } from 'nest-commander'
import { Logger } from '@nestjs/common'
import { InputsSource, MaintainerConfig, MaintainerDuty, MaintainerSDK } from '@solido-maintainer/sdk'
import { ConfigService } from '../config/config.service'

const COMMAND_NAME = 'maintainer-duty'

type MaintainerDutyCommandOptions = Partial<MaintainerConfig & {
  configFilePath: string
}>

@Command({
  name: COMMAND_NAME,
  description: 'Show which maintainer is on duty and when the configured maintainer is next',
})
export class MaintainerDutyCommand extends CommandRunner {
  private readonly logger = new Logger()

  constructor (private readonly configService: ConfigService) {
    super()
  }

  async run (inputs: string[], options: MaintainerDutyCommandOptions): Promise<void> {
    const config: MaintainerDutyCommandOptions = { ...this.configService.loadMaintainerConfig(options.configFilePath), ...options }

    this.logger.log(`Running "${COMMAND_NAME}" command...`, { ...config })
    const { slot, duty } = await this.getMaintainerDuty(config)
    this.logger.log(`Finished "${COMMAND_NAME}" command`)

    console.log(this.formatDuty(slot, config.maintainerAddress ?? '', duty))
  }

  async getMaintainerDuty (config: Partial<MaintainerConfig>): Promise<{ slot: number, duty: MaintainerDuty }> {
    const sdk = new MaintainerSDK({ ...config })
    const state = await sdk.getState()
    return { slot: state.clock.slot, duty: sdk.getMaintainerDuty(state) }
  }

  formatDuty (slot: number, maintainerAddress: string, duty: MaintainerDuty): string {
    return [
      `Slot:              ${slot}`,
      `On duty:           ${duty.current ?? 'nobody'}`,
      `Maintainer:        ${maintainerAddress || 'not configured'}`,
      `Next duty slot:    ${duty.nextDutySlot ?? 'not a maintainer'}`,
    ].join('\n')
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
    flags: '--maintainer-address <string>',
    name: 'maintainerAddress',
    description: 'SDK param `maintainerAddress`',
  })
  parseOptMaintainerAddress (val: string) {
    return val
  }
}
