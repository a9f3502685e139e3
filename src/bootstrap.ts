import FlagManager from './flag_manager.ts'
import { loadConfig } from './config.ts'
import { createLogger } from './logger.ts'

/** Build a manager from the environment, the way the CLI runs. */
export async function bootstrap(env: NodeJS.ProcessEnv = process.env): Promise<FlagManager> {
  const config = loadConfig(env)
  const logger = createLogger({ name: 'flag', level: config.logLevel })
  return new FlagManager(config.flag, { logger })
}

export async function shutdown(manager: FlagManager): Promise<void> {
  await manager.close()
}
