import { command } from 'cleye'
import { formatItem, openReader, parseCount, slice } from './display'
import { sharedFlags } from './flags'

export const top = command(
  {
    name: 'top',
    parameters: ['[count]'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Show the first COUNT (key, value) pairs (default: 10)',
      examples: ['constdb top', 'constdb top 25 -f ./passwords.cdb']
    }
  },
  (argv) => {
    const count = parseCount(argv._.count)
    const reader = openReader(argv.flags.file)

    try {
      for (const item of slice(reader, 0, count)) {
        console.log(formatItem(item))
      }
    } finally {
      reader.close()
    }
  }
)
