#!/usr/bin/env node
import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import { cli } from 'cleye'
import { all } from './commands/all'
import { count } from './commands/count'
import { get } from './commands/get'
import { put } from './commands/put'
import { tail } from './commands/tail'
import { top } from './commands/top'
import type { PackageJson } from './types'

const packageJson: PackageJson = JSON.parse(
  readFileSync(join(__dirname, '..', 'package.json'), 'utf8')
)

cli(
  {
    name: 'constdb',
    version: packageJson.version,
    commands: [top, tail, count, get, all, put],
    help: {
      description: packageJson.description
    }
  },
  (argv) => {
    argv.showHelp()
  }
)
