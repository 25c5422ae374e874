/**
 * Render compiled passes as shell-style command lines for logs and the debug
 * prompt. Display only: execution never goes through a shell.
 */

import type { CommandPass, CompiledCommand } from '../../types/pipeline.js'

const SAFE_ARG = /^[\w@%+=:,./-]+$/

/** Quote an argument the way a POSIX shell would need it. */
export function quoteArg(arg: string): string {
  if (arg === '') return "''"
  if (SAFE_ARG.test(arg)) return arg
  return `'${arg.replace(/'/g, `'\\''`)}'`
}

export function formatPass(program: string, pass: CommandPass): string {
  return [program, ...pass.args].map(quoteArg).join(' ')
}

/** One line per pass, in execution order. */
export function formatCommand(compiled: CompiledCommand): string[] {
  return compiled.passes.map((pass) => formatPass(compiled.program, pass))
}
