#!/usr/bin/env node
/**
 * image-gallery-plugin CLI entry.
 *
 * Invoked by the authoring tool: no flag prints the plugin specification,
 * `--directive` / `--transform` read one JSON document from stdin.
 */

import { runCli } from './main.js'

process.exitCode = await runCli(process.argv)
