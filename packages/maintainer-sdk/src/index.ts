export * from './addresses'
export * from './balance'
export * from './config'
export * from './data-provider/data-provider'
export * from './data-provider/data-provider.dto'
export * from './debug'
export * from './duty'
export * from './errors'
export * from './instructions'
export * from './maintenance'
export * from './metrics'
export * from './output'
export * from './sdk'
export * from './stake-account'
export * from './sysvars'
export * from './timing'
export * from './token'
export * from './types'
export * from './validator'
