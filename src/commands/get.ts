import { command } from 'cleye'
import { decodeHexKey, formatValues, openReader } from './display'
import { sharedFlags } from './flags'

export const get = command(
  {
    name: 'get',
    parameters: ['<key>'],
    flags: {
      ...sharedFlags,
      encoded: {
        type: Boolean,
        alias: 'e',
        description: 'Treat the key as hex-encoded bytes',
        default: false
      }
    },
    help: {
      description: 'Show every value stored under a key',
      examples: [
        'constdb get letmein',
        'constdb get -e 6c65746d65696e -f ./passwords.cdb'
      ]
    }
  },
  (argv) => {
    const [key] = argv._
    const lookup = argv.flags.encoded ? decodeHexKey(key) : key
    const reader = openReader(argv.flags.file)

    try {
      for (const line of formatValues(key, reader.get(lookup))) {
        console.log(line)
      }
    } finally {
      reader.close()
    }
  }
)
