#!/usr/bin/env node
/**
 * bin/mantle.ts — entry point for the `mantle` CLI command.
 */

import { program } from '../commands/index.js'

program.parse()
