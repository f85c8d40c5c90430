import { output } from './output.js'

/**
 * Exit cleanly with status 0 on Ctrl-C instead of dying mid-session.
 *
 * @returns a function that removes the handler
 */
export function registerInterruptHandler(): () => void {
  const onInterrupt = () => {
    output.info('\nInterrupted by user. Exiting...')
    process.exit(0)
  }
  process.once('SIGINT', onInterrupt)
  return () => {
    process.removeListener('SIGINT', onInterrupt)
  }
}
