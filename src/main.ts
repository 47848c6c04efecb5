import 'reflect-metadata'
import { CommandFactory } from 'nest-commander'
import { CliModule } from './cli.module'
import { Logger } from './logger'

async function bootstrap () {
  await CommandFactory.run(CliModule, new Logger())
}

bootstrap().catch((err: unknown) => {
  new Logger().error('Command failed', { err })
  process.exitCode = 1
})
