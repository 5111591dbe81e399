import { Command } from 'commander'

export { Command }
