#!/usr/bin/env node
import { Command } from 'commander'
import { registerDiscoverCommand } from './commands/discover.js'
import { registerInterruptHandler } from './interrupt.js'

const program = new Command()

program
  .name('ssdp-scout')
  .description('Discover UPnP devices on the local network via SSDP')
  .version('0.1.0')

registerDiscoverCommand(program)
registerInterruptHandler()

export { program }

await program.parseAsync()
