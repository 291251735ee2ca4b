import { command } from 'cleye'
import {
  formatItem,
  openReader,
  parseCount,
  slice,
  tailSkip
} from './display'
import { sharedFlags } from './flags'

export const tail = command(
  {
    name: 'tail',
    parameters: ['[count]'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Show the last COUNT (key, value) pairs (default: 10)',
      examples: ['constdb tail', 'constdb tail 5 -f ./passwords.cdb']
    }
  },
  (argv) => {
    const count = parseCount(argv._.count)
    const reader = openReader(argv.flags.file)

    try {
      for (const item of slice(reader, tailSkip(reader.size(), count))) {
        console.log(formatItem(item))
      }
    } finally {
      reader.close()
    }
  }
)
