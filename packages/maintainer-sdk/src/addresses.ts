import { PublicKey } from '@solana/web3.js'

export enum StakeType {
  STAKE = 'STAKE',
  UNSTAKE = 'UNSTAKE',
}

const VALIDATOR_STAKE_ACCOUNT = 'validator_stake_account'
const VALIDATOR_UNSTAKE_ACCOUNT = 'validator_unstake_account'
const RESERVE_ACCOUNT = 'reserve_account'
const STAKE_AUTHORITY = 'stake_authority'
const MINT_AUTHORITY = 'mint_authority'

const u64le = (value: number): Buffer => {
  const buffer = Buffer.alloc(8)
  buffer.writeBigUInt64LE(BigInt(value))
  return buffer
}

const findAddress = (programId: string, seeds: (Buffer | Uint8Array)[]): string =>
  PublicKey.findProgramAddressSync(seeds, new PublicKey(programId))[0].toBase58()

export const deriveStakeAddress = (
  programId: string,
  solidoAddress: string,
  validatorVoteAccount: string,
  seed: number,
  stakeType: StakeType,
): string => findAddress(programId, [
  new PublicKey(solidoAddress).toBuffer(),
  new PublicKey(validatorVoteAccount).toBuffer(),
  Buffer.from(stakeType === StakeType.STAKE ? VALIDATOR_STAKE_ACCOUNT : VALIDATOR_UNSTAKE_ACCOUNT),
  u64le(seed),
])

// Deposits made while the last stake account is still activating go through a
// temporary account that is merged into it in the same instruction.
// Seeded like the stake account, followed by the epoch.
export const deriveTemporaryStakeAddress = (
  programId: string,
  solidoAddress: string,
  validatorVoteAccount: string,
  seed: number,
  epoch: number,
): string => findAddress(programId, [
  new PublicKey(solidoAddress).toBuffer(),
  new PublicKey(validatorVoteAccount).toBuffer(),
  Buffer.from(VALIDATOR_STAKE_ACCOUNT),
  u64le(seed),
  u64le(epoch),
])

const deriveAuthority = (programId: string, solidoAddress: string, authority: string): string =>
  findAddress(programId, [new PublicKey(solidoAddress).toBuffer(), Buffer.from(authority)])

export const deriveReserveAddress = (programId: string, solidoAddress: string): string =>
  deriveAuthority(programId, solidoAddress, RESERVE_ACCOUNT)

export const deriveStakeAuthority = (programId: string, solidoAddress: string): string =>
  deriveAuthority(programId, solidoAddress, STAKE_AUTHORITY)

export const deriveMintAuthority = (programId: string, solidoAddress: string): string =>
  deriveAuthority(programId, solidoAddress, MINT_AUTHORITY)
