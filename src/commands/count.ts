import { command } from 'cleye'
import { openReader, quote } from './display'
import { sharedFlags } from './flags'

export const count = command(
  {
    name: 'count',
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Show how many (key, value) pairs the CDB holds',
      examples: ['constdb count', 'constdb count -f ./passwords.cdb']
    }
  },
  (argv) => {
    const file = argv.flags.file
    const reader = openReader(file)

    try {
      console.log(`There are ${reader.size()} items in the CDB at ${quote(file)}`)
    } finally {
      reader.close()
    }
  }
)
