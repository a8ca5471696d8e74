#!/usr/bin/env -S npx tsx
/**
 * Overlay Control Tool
 * Sends control commands to a running overlay over its Unix socket
 */

import chalk from 'chalk'
import { Command } from 'commander'

import { ControlClient } from './client'
import type { ControlReply } from './client'
import { getConfig } from './config'

export function formatReply(reply: ControlReply): string {
  if (!reply.ok) {
    return chalk.red(`ERROR: ${reply.reason}`)
  }
  if (typeof reply.payload === 'string') {
    return chalk.green(`OK: ${reply.payload}`)
  }
  return chalk.green('OK') + '\n' + JSON.stringify(reply.payload, null, 2)
}

async function run(action: (client: ControlClient) => Promise<ControlReply>, json: boolean): Promise<void> {
  const config = getConfig()
  const client = new ControlClient(config)
  try {
    const reply = await action(client)
    console.log(json ? reply.raw : formatReply(reply))
    if (!reply.ok) process.exitCode = 1
  } catch (error) {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)))
    process.exitCode = 2
  }
}

const program = new Command()
  .name('intime-ctl')
  .description('Control a running overlay')
  .option('--raw', 'Print the reply line exactly as received')

function raw(): boolean {
  return program.opts<{ raw?: boolean }>().raw === true
}

program.command('status')
  .description('Show the primary instance state')
  .action(() => run((client) => client.status(), raw()))

program.command('reload')
  .description('Re-read config.json on every instance')
  .action(() => run((client) => client.reloadConfig(), raw()))

program.command('alarm')
  .description('Raise the forbidden-content alarm on every instance')
  .argument('<class>', 'Window class that triggered the alarm')
  .argument('<title>', 'Window title')
  .argument('<message...>', 'Message to show')
  .action((sourceClass: string, title: string, message: string[]) =>
    run((client) => client.triggerAlarm(sourceClass, title, message.join(' ')), raw()))

program.command('dismiss')
  .description('Dismiss the alarm on every instance')
  .action(() => run((client) => client.dismissAlarm(), raw()))

program.command('reset')
  .description('Return every instance to clock mode')
  .action(() => run((client) => client.resetDeadline(), raw()))

program.command('toggle-sampling')
  .description('Toggle adaptive color on the primary instance')
  .action(() => run((client) => client.toggleSampling(), raw()))

program.command('send')
  .description('Send a raw command line')
  .argument('<line>', 'Command line, e.g. "forbidden_alarm:cls|title|msg"')
  .action((line: string) => run((client) => client.send(line), raw()))

void program.parseAsync(process.argv)
