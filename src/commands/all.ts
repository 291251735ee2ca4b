import { command } from 'cleye'
import { formatItem, openReader } from './display'
import { sharedFlags } from './flags'

export const all = command(
  {
    name: 'all',
    flags: {
      ...sharedFlags,
      yesIAmSure: {
        type: Boolean,
        description: 'Confirm printing every record, however many there are',
        default: false
      }
    },
    help: {
      description: 'Show every (key, value) pair',
      examples: ['constdb all --yes-i-am-sure -f ./passwords.cdb']
    }
  },
  (argv) => {
    if (!argv.flags.yesIAmSure) {
      console.error('Refusing to print every record without --yes-i-am-sure')
      process.exit(1)
    }

    const reader = openReader(argv.flags.file)

    try {
      for (const item of reader) {
        console.log(formatItem(item))
      }
    } finally {
      reader.close()
    }
  }
)
