#!/usr/bin/env node

/**
 * Satellite Inventory — Entry Point
 *
 * Ansible runs this with --list or --host NAME.
 */

import { run } from './cli/main.js'

process.exitCode = await run(process.argv.slice(2), { color: process.stderr.isTTY })
