#!/usr/bin/env node

import * as output from './output.js';
import { createProgram } from './program.js';

createProgram()
	.parseAsync(process.argv)
	.catch((err: unknown) => {
		output.error(err instanceof Error ? err.message : String(err));
		process.exitCode = 1;
	});
