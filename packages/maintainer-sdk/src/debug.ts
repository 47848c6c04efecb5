import { LogVerbosity } from './config'

/**
 * Collects why each maintenance step did or did not act on the validators
 * listed in `debugVoteAccounts`, printed once the selection is over.
 */
export class Debug {
  private infos: [string, string][] = []
  private events: string[] = []

  constructor (
    private readonly voteAccounts: Set<string>,
    private readonly logVerbosity: LogVerbosity = LogVerbosity.DEBUG,
  ) { }

  getVoteAccounts (): ReadonlySet<string> {
    return this.voteAccounts
  }

  getEvents (): readonly string[] {
    return this.events
  }

  pushInfo (context: string, info: string) {
    this.infos.push([context, info])
  }

  pushValidatorEvent (voteAccount: string, event: string) {
    if (this.voteAccounts.has(voteAccount)) {
      this.events.push(`${voteAccount} ${event}`)
    }
  }

  private formatInfo (): string {
    return this.infos.map(([context, info]) => `DEBUG INFO - ${context}: ${info}`).join('\n')
  }

  private formatEvents (): string {
    return this.events.map(event => `DEBUG EVENT - ${event}`).join('\n')
  }

  printDebugContent () {
    if (this.logVerbosity > LogVerbosity.DEBUG || (this.infos.length === 0 && this.events.length === 0)) {
      return
    }
    console.log(
      `==============================\n${this.formatInfo()}\n${this.formatEvents()}\n==============================`,
    )
  }
}
