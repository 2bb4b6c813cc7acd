/**
 * n8n-setup CLI entry point
 */

import { reportError } from './errors';
import { createProgram } from './program';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    process.exitCode = reportError(error, 'cli');
  });
