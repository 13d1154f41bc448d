#!/usr/bin/env node
/**
 * bin/sysconfig-check.ts — entry point for the `sysconfig-check` command.
 */

import { program } from '../commands/index.js'

program.parse()
