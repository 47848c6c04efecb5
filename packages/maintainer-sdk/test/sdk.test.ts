import { InstructionIntent, InstructionKind, MaintainerSDK, MaintenanceError, MaintenanceTask } from '../src'
import { StaticDataProviderBuilder } from './helpers/static-data-provider-builder'
import { LAMPORTS_PER_SOL, pubkey, STAKE_RENT, TEST_CONFIG, TEST_MAINTAINER } from './helpers/utils'
import { generateIdentities, generateVoteAccounts, ValidatorMockBuilder } from './helpers/validator-mock-builder'

const mockSubmitter = () => ({
  submit: jest.fn((_instruction: InstructionIntent, _signers: readonly string[]) => Promise.resolve()),
})

const poolWithDeposit = () => {
  const voteAccounts = generateVoteAccounts()
  const identities = generateIdentities()
  return new StaticDataProviderBuilder()
    .withValidators([
      new ValidatorMockBuilder(voteAccounts.next().value, identities.next().value),
      new ValidatorMockBuilder(voteAccounts.next().value, identities.next().value),
    ])
    .withReserveBalance(10 * LAMPORTS_PER_SOL)
}

describe('maintainer sdk', () => {
  it('submits the selected instruction signed by the maintainer', async () => {
    const submitter = mockSubmitter()
    const sdk = new MaintainerSDK(TEST_CONFIG, poolWithDeposit().builder())

    const output = await sdk.performMaintenance(submitter)

    expect(output?.task).toEqual(MaintenanceTask.STAKE_DEPOSIT)
    expect(submitter.submit).toHaveBeenCalledTimes(1)
    const [instruction, signers] = submitter.submit.mock.calls[0]
    expect(instruction.kind).toEqual(InstructionKind.STAKE_DEPOSIT)
    expect(signers).toEqual([TEST_MAINTAINER])
  })

  it('submits nothing when there is nothing to do', async () => {
    const submitter = mockSubmitter()
    const voteAccounts = generateVoteAccounts()
    const identities = generateIdentities()
    const builder = new StaticDataProviderBuilder().withValidators([
      new ValidatorMockBuilder(voteAccounts.next().value, identities.next().value)
        .withStakeAccount({ active: 5 * LAMPORTS_PER_SOL - STAKE_RENT }),
    ])
    const sdk = new MaintainerSDK(TEST_CONFIG, builder.builder())

    expect(await sdk.performMaintenance(submitter)).toBeNull()
    expect(submitter.submit).not.toHaveBeenCalled()
  })

  it('refuses to maintain with an underfunded maintainer', async () => {
    const submitter = mockSubmitter()
    const builder = poolWithDeposit().withMaintainers([TEST_MAINTAINER], 0.05 * LAMPORTS_PER_SOL)
    const sdk = new MaintainerSDK(TEST_CONFIG, builder.builder())

    const result = sdk.performMaintenance(submitter)
    await expect(result).rejects.toThrow(MaintenanceError)
    await expect(result).rejects.toThrow(
      `Balance of the maintainer account ${TEST_MAINTAINER} is less than 0.100000000 SOL. Please fund the maintainer account.`,
    )
    expect(submitter.submit).not.toHaveBeenCalled()
  })

  it('propagates submission failures', async () => {
    const submitter = { submit: jest.fn(() => Promise.reject(new Error('Transaction expired'))) }
    const sdk = new MaintainerSDK(TEST_CONFIG, poolWithDeposit().builder())

    await expect(sdk.performMaintenance(submitter)).rejects.toThrow('Transaction expired')
  })

  describe('duty', () => {
    it('puts the only maintainer on duty', () => {
      const state = new StaticDataProviderBuilder().buildState(TEST_CONFIG)
      const sdk = new MaintainerSDK(TEST_CONFIG)

      expect(sdk.getMaintainerDuty(state)).toEqual({
        current: TEST_MAINTAINER,
        isOnDuty: true,
        nextDutySlot: 43_300,
      })
    })

    it('waits for the slice of the maintainer', () => {
      const other = pubkey(98)
      const state = new StaticDataProviderBuilder().withMaintainers([other, TEST_MAINTAINER]).buildState(TEST_CONFIG)
      const sdk = new MaintainerSDK(TEST_CONFIG)

      expect(sdk.getMaintainerDuty(state)).toEqual({
        current: other,
        isOnDuty: false,
        nextDutySlot: 43_300,
      })
    })

    it('has no duty slot for an unknown maintainer', () => {
      const config = { ...TEST_CONFIG, maintainerAddress: pubkey(99) }
      const state = new StaticDataProviderBuilder().buildState(config)

      expect(new MaintainerSDK(config).getMaintainerDuty(state)).toEqual({
        current: TEST_MAINTAINER,
        isOnDuty: false,
        nextDutySlot: null,
      })
    })
  })

  it('names validators in metrics without the configured prefix', () => {
    const voteAccounts = generateVoteAccounts()
    const identities = generateIdentities()
    const state = new StaticDataProviderBuilder()
      .withValidators([new ValidatorMockBuilder(voteAccounts.next().value, identities.next().value).withName('Pool: Alpha')])
      .buildState(TEST_CONFIG)
    const sdk = new MaintainerSDK({ ...TEST_CONFIG, validatorNamePrefix: 'Pool: ' })

    expect(sdk.collectMetrics(state).validators[0].name).toEqual('Alpha')
  })
})
