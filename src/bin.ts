#!/usr/bin/env node
import { log, error } from './log'
import { run } from './index'

run(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode
    if (exitCode === 0) {
      log('done')
    }
  })
  .catch((err) => {
    error(err)
    process.exitCode = 1
  })
