/**
 * Control Socket Client
 * Sends one command line and reads the single-line reply
 */

import * as net from 'net'

export interface ControlClientConfig {
  socketPath: string
  timeout?: number
}

export type ControlReply =
  | { ok: true; payload: unknown; raw: string }
  | { ok: false; reason: string; raw: string }

export class ControlClientError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ControlClientError'
  }
}

/**
 * Parse a raw `OK:<json>` / `ERROR:<reason>` reply line
 */
export function parseReply(raw: string): ControlReply {
  const line = raw.replace(/\r?\n$/, '')
  if (line.startsWith('OK:')) {
    const body = line.slice(3)
    try {
      return { ok: true, payload: JSON.parse(body), raw: line }
    } catch {
      return { ok: true, payload: body, raw: line }
    }
  }
  if (line.startsWith('ERROR:')) {
    return { ok: false, reason: line.slice(6), raw: line }
  }
  throw new ControlClientError(`Unexpected reply: ${line}`)
}

export class ControlClient {
  private socketPath: string
  private timeout: number

  constructor(config: ControlClientConfig) {
    this.socketPath = config.socketPath
    this.timeout = config.timeout || 3000
  }

  /**
   * Send a raw command line and return the raw reply
   */
  sendRaw(line: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const socket = net.connect(this.socketPath)
      let received = ''
      let settled = false

      const finish = (err: Error | null) => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        socket.destroy()
        if (err) {
          reject(err)
        } else {
          resolve(received)
        }
      }

      const timer = setTimeout(() => {
        finish(new ControlClientError(`No reply within ${this.timeout}ms`))
      }, this.timeout)

      socket.setEncoding('utf8')
      socket.on('connect', () => {
        socket.write(line + '\n')
      })
      socket.on('data', (chunk: Buffer | string) => {
        received += chunk.toString()
      })
      socket.on('end', () => finish(null))
      socket.on('error', (err: Error) => {
        const code = 'code' in err ? err.code : undefined
        if (code === 'ENOENT' || code === 'ECONNREFUSED') {
          finish(new ControlClientError(`Overlay is not running (no listener on ${this.socketPath})`))
        } else {
          finish(err)
        }
      })
    })
  }

  async send(line: string): Promise<ControlReply> {
    return parseReply(await this.sendRaw(line))
  }

  status(): Promise<ControlReply> {
    return this.send('status')
  }

  reloadConfig(): Promise<ControlReply> {
    return this.send('reload_config')
  }

  /**
   * Raise the alarm; `|` separates the payload fields, so only the message may contain it
   */
  async triggerAlarm(sourceClass: string, title: string, message: string): Promise<ControlReply> {
    if (sourceClass.includes('|') || title.includes('|')) {
      throw new ControlClientError('Alarm class and title must not contain "|"')
    }
    return this.send(`forbidden_alarm:${sourceClass}|${title}|${message}`)
  }

  dismissAlarm(): Promise<ControlReply> {
    return this.send('dismiss_alarm')
  }

  resetDeadline(): Promise<ControlReply> {
    return this.send('reset_deadline')
  }

  toggleSampling(): Promise<ControlReply> {
    return this.send('toggle_screen_sampling')
  }
}
