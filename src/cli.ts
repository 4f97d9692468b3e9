#!/usr/bin/env node
"use strict"
import {runS3LogReader} from './handlers/readCommand'

runS3LogReader(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode
  }, (e: Error) => {
    console.error(e)
    process.exitCode = 1
  })
