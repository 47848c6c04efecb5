import { PublicKey } from '@solana/web3.js'
import {
  DEFAULT_CONFIG,
  DEFAULT_RENT,
  LogVerbosity,
  MaintainerConfig,
  minimumBalance,
  STAKE_ACCOUNT_DATA_LEN,
} from '../../src'

// Deterministic keys, `n` must be positive: the all-zero key is the system program.
export const pubkey = (n: number): string => {
  const bytes = Buffer.alloc(32)
  bytes.writeUInt32LE(n)
  return new PublicKey(bytes).toBase58()
}

export const LAMPORTS_PER_SOL = 1_000_000_000
// 2_282_880 lamports
export const STAKE_RENT = minimumBalance(DEFAULT_RENT, STAKE_ACCOUNT_DATA_LEN).amount.toNumber()
// 890_880 lamports
export const RESERVE_RENT = minimumBalance(DEFAULT_RENT, 0).amount.toNumber()

export const TEST_PROGRAM_ID = pubkey(1)
export const TEST_SOLIDO_ADDRESS = pubkey(2)
export const TEST_MAINTAINER = pubkey(3)

export const TEST_CONFIG: MaintainerConfig = {
  ...DEFAULT_CONFIG,
  snapshotApiBaseUrl: 'http://snapshot.test',
  solidoProgramId: TEST_PROGRAM_ID,
  solidoAddress: TEST_SOLIDO_ADDRESS,
  maintainerAddress: TEST_MAINTAINER,
  logVerbosity: LogVerbosity.ERROR,
}
