#!/usr/bin/env node
import { runCli } from "./kmd-commands"

process.exitCode = runCli(process.argv.slice(2))
