import { Injectable, Logger } from '@nestjs/common'
import { InstructionIntent, Submitter } from '@solido-maintainer/sdk'

/**
 * Dry-run submitter: logs what would be sent instead of signing it.
 * Signing and sending transactions needs the maintainer key, which this CLI never reads.
 */
@Injectable()
export class LoggingSubmitter implements Submitter {
  private readonly logger = new Logger()
  private readonly submitted: InstructionIntent[] = []

  async submit (instruction: InstructionIntent, signers: readonly string[]): Promise<void> {
    this.submitted.push(instruction)
    this.logger.log(`Submitting "${instruction.kind}" instruction`, {
      programId: instruction.programId,
      accounts: instruction.accounts,
      signers,
    })
  }

  getSubmitted (): readonly InstructionIntent[] {
    return this.submitted
  }
}
