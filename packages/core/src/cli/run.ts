/**
 * The `nfa-witness` command.
 * @packageDocumentation
 */

import registerDebug from 'debug'
import yargs from 'yargs/yargs'
import type { Automaton } from '../automaton'
import { applyLevel, journeyAlphabet, loadConstraints } from '../levels'
import { readAutFile } from '../parse'
import { ConfigError, resolveConfig, type CliConfig } from './config'

const debugCli = registerDebug('nfa-witness:cli')

const MISSING_FILE_MESSAGE = "Error: The first argument must be the path to a '.aut' file."
const INVALID_FILE_MESSAGE = "Error: The given file is not a valid '.aut' file."

/**
 * Where the command writes its lines.
 * @public
 */
export interface CliOutput {
  stdout(line: string): void
  stderr(line: string): void
}

const consoleOutput: CliOutput = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
}

/**
 * Run the command: read a journey automaton, apply a level's constraints and
 * print the shortest accepted journey, or `none`.
 *
 * @param argv - Arguments without the node and script paths
 * @param output - Line sinks for stdout and stderr
 * @returns Process exit code
 *
 * @public
 */
export async function run(argv: readonly string[], output: CliOutput = consoleOutput): Promise<number> {
  let file: string
  let level: number | undefined
  let constraints: string | undefined

  try {
    const args = await yargs([...argv])
      .scriptName('nfa-witness')
      .usage('$0 <file> [options]\n\nPrint the shortest journey accepted by an .aut automaton under a level.')
      .option('level', {
        alias: 'l',
        type: 'number',
        describe: 'constraint level to apply (0, 1 or 2)',
      })
      .option('constraints', {
        type: 'string',
        describe: 'directory holding the constraint .aut files',
      })
      .demandCommand(1, MISSING_FILE_MESSAGE)
      .exitProcess(false)
      .fail((message: string | null, error: Error | undefined) => {
        throw error ?? new ConfigError(message ?? MISSING_FILE_MESSAGE)
      })
      .parseAsync()

    // --help and --version print and stop
    if (args._.length === 0) return 0

    file = String(args._[0])
    level = args.level
    constraints = args.constraints
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error
    debugCli('argument error: %s', error.message)
    output.stderr(error.message)
    return 1
  }

  let config: CliConfig
  try {
    config = resolveConfig({ file, level, constraints })
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error
    output.stderr(`Error: ${error.message}`)
    return 1
  }
  debugCli('running level %d on %s', config.level, config.file)

  // Constraint files ship with the tool; a broken one is not the user's input error
  const constraintSet = await loadConstraints(config.constraintsDir, journeyAlphabet)

  let journey: Automaton
  try {
    journey = await readAutFile(config.file, journeyAlphabet)
  } catch (error) {
    debugCli('cannot read %s: %O', config.file, error)
    output.stderr(INVALID_FILE_MESSAGE)
    return 1
  }

  const constrained = applyLevel(config.level, journey, constraintSet)
  debugCli('constrained automaton has %d states', constrained.size)

  output.stdout(constrained.shortestExample(true) ?? 'none')
  return 0
}
