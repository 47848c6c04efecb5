import { Injectable } from '@nestjs/common'
import { DEFAULT_CONFIG, MaintainerConfig } from '@solido-maintainer/sdk'
import * as dotenv from 'dotenv'
import fs from 'fs'
import { Logger } from '../logger'

dotenv.config()

@Injectable()
export class ConfigService {
  private readonly logger = new Logger()

  private getEnvVar (key: string, defaultVal?: string): string {
    const val = process.env[key] ?? defaultVal
    if (!val) {
      this.logger.error(`Missing environment variable: ${key}`)
      throw new Error(`Missing environment variable: ${key}`)
    }
    return val
  }

  readonly snapshotApiBaseUrl = this.getEnvVar('SNAPSHOT_API_BASE_URL', DEFAULT_CONFIG.snapshotApiBaseUrl)
  readonly solidoProgramId = this.getEnvVar('SOLIDO_PROGRAM_ID', DEFAULT_CONFIG.solidoProgramId)
  readonly solidoAddress = this.getEnvVar('SOLIDO_ADDRESS', DEFAULT_CONFIG.solidoAddress)
  // Read-only commands work without a maintainer
  readonly maintainerAddress = process.env.MAINTAINER_ADDRESS ?? DEFAULT_CONFIG.maintainerAddress

  /**
   * Environment first, then the JSON config file on top of it.
   * Command line options are merged over the result by the commands.
   */
  loadMaintainerConfig (configFilePath?: string): Partial<MaintainerConfig> {
    const fileConfig: Partial<MaintainerConfig> = configFilePath ? JSON.parse(fs.readFileSync(configFilePath).toString()) : {}
    return {
      snapshotApiBaseUrl: this.snapshotApiBaseUrl,
      solidoProgramId: this.solidoProgramId,
      solidoAddress: this.solidoAddress,
      maintainerAddress: this.maintainerAddress,
      ...fileConfig,
    }
  }
}
