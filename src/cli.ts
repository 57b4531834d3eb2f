#!/usr/bin/env node
import { createProgram, nodeDeps } from './cli/program';

createProgram(nodeDeps)
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    nodeDeps.stderr(`${error instanceof Error ? error.message : String(error)}\n`);
    nodeDeps.setExitCode(1);
  });
