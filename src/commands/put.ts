import { existsSync } from 'node:fs'
import { command } from 'cleye'
import { Reader, Writer } from '../cdb'
import { quote } from './display'
import { sharedFlags } from './flags'

/**
 * Resume the database at `file`, or start a new one if there is none.
 */
function openWriter(file: string): Writer {
  if (!existsSync(file)) {
    return Writer.createFile(file)
  }
  const reader = Reader.openFile(file, { writable: true })
  try {
    return reader.asWriter()
  } catch (error) {
    reader.close()
    throw error
  }
}

export const put = command(
  {
    name: 'put',
    parameters: ['<key>', '<value>'],
    flags: {
      ...sharedFlags
    },
    help: {
      description:
        'Append a (key, value) pair, creating the CDB if it does not exist',
      examples: [
        'constdb put letmein 10',
        'constdb put -f ./passwords.cdb letmein 10'
      ]
    }
  },
  (argv) => {
    const [key, value] = argv._
    const file = argv.flags.file

    const writer = openWriter(file)

    try {
      writer.put(key, value)
    } finally {
      writer.close()
    }

    console.log(`Stored ${quote(value)} under ${quote(key)} (${writer.size()} items)`)
  }
)
