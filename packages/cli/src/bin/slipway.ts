#!/usr/bin/env node
/**
 * bin/slipway.ts — entry point for the `slipway` CLI command.
 */

const { program } = await import('../commands/index.js')
await program.parseAsync()
