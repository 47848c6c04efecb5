import { Allocator, uniformAllocator } from './balance'
import { DEFAULT_CONFIG, LogVerbosity, MaintainerConfig } from './config'
import { DataProvider } from './data-provider/data-provider'
import { Debug } from './debug'
import { getCurrentMaintainerDuty, getNextMaintainerDutySlot } from './duty'
import { InstructionIntent } from './instructions'
import { assertMaintainerFunded, selectMaintenance } from './maintenance'
import { collectPoolMetrics, PoolMetrics } from './metrics'
import { formatMaintenanceOutput, MaintenanceInstruction, MaintenanceOutput } from './output'
import { SolidoState } from './types'

export const defaultDataProviderBuilder = (config: MaintainerConfig) => new DataProvider({ ...config }, config.inputsSource)

/** Signs and sends instructions, the SDK never holds keys. */
export interface Submitter {
  submit (instruction: InstructionIntent, signers: readonly string[]): Promise<void>
}

export type MaintainerDuty = {
  // Maintainer on duty in the snapshot slot, null during the pause between slices
  current: string | null
  isOnDuty: boolean
  // Null when the configured maintainer is not in the maintainer list
  nextDutySlot: number | null
}

export class MaintainerSDK {
  readonly config: MaintainerConfig
  private readonly dataProvider: DataProvider

  constructor (
    config: Partial<MaintainerConfig> = {},
    dataProviderBuilder = defaultDataProviderBuilder,
    private readonly allocator: Allocator = uniformAllocator,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config }
    this.dataProvider = dataProviderBuilder(this.config)
  }

  async getState (): Promise<SolidoState> {
    return this.dataProvider.getState()
  }

  selectMaintenance (state: SolidoState): MaintenanceInstruction | null {
    const debug = new Debug(new Set(this.config.debugVoteAccounts), this.config.logVerbosity)
    debug.pushInfo('snapshot', `slot ${state.clock.slot}, epoch ${state.clock.epoch}, ${state.validators.length} validators`)
    const maintenance = selectMaintenance(state, { allocator: this.allocator, debug })
    debug.printDebugContent()
    return maintenance
  }

  /**
   * Submits at most one maintenance instruction for the snapshot.
   * There may be more work left afterwards, callers loop on fresh snapshots until this returns null.
   */
  async tryPerformMaintenance (state: SolidoState, submitter: Submitter): Promise<MaintenanceOutput | null> {
    assertMaintainerFunded(state)
    const maintenance = this.selectMaintenance(state)
    if (maintenance === null) {
      return null
    }
    await submitter.submit(maintenance.instruction, [state.maintainerAddress, ...maintenance.additionalSigners])
    if (this.config.logVerbosity <= LogVerbosity.INFO) {
      console.log(formatMaintenanceOutput(maintenance.output))
    }
    return maintenance.output
  }

  async performMaintenance (submitter: Submitter): Promise<MaintenanceOutput | null> {
    const state = await this.getState()
    return this.tryPerformMaintenance(state, submitter)
  }

  getMaintainerDuty (state: SolidoState): MaintainerDuty {
    const current = getCurrentMaintainerDuty(state)
    return {
      current,
      isOnDuty: current === state.maintainerAddress,
      nextDutySlot: getNextMaintainerDutySlot(state, state.maintainerAddress),
    }
  }

  collectMetrics (state: SolidoState): PoolMetrics {
    return collectPoolMetrics(state, this.config.validatorNamePrefix)
  }
}
