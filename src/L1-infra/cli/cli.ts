import { Command, CommanderError, Option } from 'commander'

export { Command, CommanderError, Option }
export type { OptionValues } from 'commander'
