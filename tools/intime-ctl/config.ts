/**
 * Configuration Management
 * Resolves the control socket path from the environment
 */

import * as dotenv from 'dotenv'

// Load .env from the working directory; existing variables win
dotenv.config()

export const DEFAULT_SOCKET_PATH = '/tmp/intime_widget.sock'

export interface CtlConfig {
  socketPath: string
  timeout: number
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): CtlConfig {
  const timeout = parseInt(env.INTIME_CTL_TIMEOUT || '3000')
  return {
    socketPath: env.INTIME_SOCKET_PATH?.trim() || DEFAULT_SOCKET_PATH,
    timeout: Number.isFinite(timeout) && timeout > 0 ? timeout : 3000,
  }
}
