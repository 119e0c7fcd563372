#!/usr/bin/env node
/**
 * ptpconf CLI
 */

import { createProgram } from './program.js';

// コマンドラインを解析
await createProgram().parseAsync(process.argv);
